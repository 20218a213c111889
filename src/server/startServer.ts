/**
 * startServer — Serve a tool registry over stdio, SSE or streamable HTTP
 *
 * ```
 * stdio   one session on the process's stdin/stdout
 * sse     GET /sse opens a stream, POST /messages?sessionId=… sends to it
 * http    POST /mcp, one stateless request/response per call
 * ```
 *
 * Each connection gets its own MCP `Server`; all of them share the registry.
 *
 * @module
 */
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { TransportKind } from '../config/ServerConfig.js';
import type { Logger } from '../observability/Logger.js';
import type { ToolRegistry } from './ToolRegistry.js';

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';
export const HTTP_PATH = '/mcp';

export interface StartServerOptions<TContext> {
    readonly name: string;
    readonly version: string;
    readonly registry: ToolRegistry<TContext>;
    readonly contextFactory: () => TContext | Promise<TContext>;
    readonly transport: TransportKind;
    /** Bind address for `sse` and `http` */
    readonly host: string;
    readonly port: number;
    readonly logger: Logger;
}

export interface RunningServer {
    readonly transport: TransportKind;
    /** `http://host:port` for the network transports */
    readonly url?: string;
    close(): Promise<void>;
}

export async function startServer<TContext>(options: StartServerOptions<TContext>): Promise<RunningServer> {
    const newServer = (): Server => {
        const server = new Server(
            { name: options.name, version: options.version },
            { capabilities: { tools: {} } },
        );
        options.registry.attachToServer(server, { contextFactory: options.contextFactory });
        return server;
    };

    if (options.transport === 'stdio') {
        const server = newServer();
        await server.connect(new StdioServerTransport());
        options.logger.info(`Serving ${options.registry.toolNames.length} tools on stdio`);
        return { transport: 'stdio', close: () => server.close() };
    }

    const handle = options.transport === 'sse'
        ? sseHandler(newServer, options.logger)
        : httpHandler(newServer, options.logger);

    const httpServer = createServer((req, res) => {
        handle(req, res).catch((err: unknown) => {
            options.logger.error(`${req.method ?? '?'} ${req.url ?? '?'} failed: ${describe(err)}`);
            if (!res.headersSent) res.writeHead(500).end('Internal server error');
        });
    });

    await new Promise<void>((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(options.port, options.host, () => {
            httpServer.off('error', reject);
            resolve();
        });
    });

    // Port 0 binds a free port
    const address = httpServer.address();
    const port = typeof address === 'object' && address !== null ? address.port : options.port;
    const url = `http://${options.host}:${port}`;
    const entry = options.transport === 'sse' ? SSE_PATH : HTTP_PATH;
    options.logger.info(`Serving ${options.registry.toolNames.length} tools on ${url}${entry}`);

    return {
        transport: options.transport,
        url,
        close: () => new Promise<void>((resolve, reject) => {
            httpServer.closeAllConnections();
            httpServer.close(err => (err ? reject(err) : resolve()));
        }),
    };
}

// ── Handlers ─────────────────────────────────────────────

type Handler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

function sseHandler(newServer: () => Server, logger: Logger): Handler {
    const transports = new Map<string, SSEServerTransport>();

    return async (req, res) => {
        const url = new URL(req.url ?? '/', 'http://localhost');

        if (req.method === 'GET' && url.pathname === SSE_PATH) {
            const transport = new SSEServerTransport(MESSAGES_PATH, res);
            transports.set(transport.sessionId, transport);
            res.on('close', () => {
                transports.delete(transport.sessionId);
                logger.debug(`session ${transport.sessionId} closed`);
            });
            logger.debug(`session ${transport.sessionId} opened`);
            await newServer().connect(transport);
            return;
        }

        if (req.method === 'POST' && url.pathname === MESSAGES_PATH) {
            const transport = transports.get(url.searchParams.get('sessionId') ?? '');
            if (transport === undefined) {
                res.writeHead(400).end('Unknown session');
                return;
            }
            await transport.handlePostMessage(req, res);
            return;
        }

        res.writeHead(404).end();
    };
}

function httpHandler(newServer: () => Server, logger: Logger): Handler {
    return async (req, res) => {
        const url = new URL(req.url ?? '/', 'http://localhost');
        if (url.pathname !== HTTP_PATH) {
            res.writeHead(404).end();
            return;
        }
        if (req.method !== 'POST') {
            res.writeHead(405, { Allow: 'POST' }).end('Method not allowed');
            return;
        }

        const server = newServer();
        const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
        res.on('close', () => {
            transport.close().catch((err: unknown) => logger.warn(`closing transport failed: ${describe(err)}`));
            server.close().catch((err: unknown) => logger.warn(`closing server failed: ${describe(err)}`));
        });
        await server.connect(transport);
        await transport.handleRequest(req, res);
    };
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
