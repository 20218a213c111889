import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { z } from 'zod';
import { actionFor, defineTool } from '../../src/server/defineTool.js';
import { success } from '../../src/server/response.js';
import { HTTP_PATH, startServer, type RunningServer } from '../../src/server/startServer.js';
import { ToolRegistry } from '../../src/server/ToolRegistry.js';
import { memoryLogger } from '../fixtures/FakeGateway.js';

interface Ctx {
    readonly greeting: string;
}

const action = actionFor<Ctx>();

function registry(): ToolRegistry<Ctx> {
    const reg = new ToolRegistry<Ctx>();
    reg.register(defineTool<Ctx>('echo', {
        description: 'Echo',
        actions: {
            say: action({
                description: 'Repeat a word.',
                readOnly: true,
                params: z.object({ word: z.string() }),
                handler: async (ctx, args) => success(`${ctx.greeting} ${args.word}`),
            }),
        },
    }));
    return reg;
}

let running: RunningServer | undefined;

afterEach(async () => {
    await running?.close();
    running = undefined;
});

async function serveHttp(): Promise<{ url: string; lines: string[] }> {
    const { logger, lines } = memoryLogger('info');
    running = await startServer({
        name: 'test',
        version: '0.0.0',
        registry: registry(),
        contextFactory: () => ({ greeting: 'hi' }),
        transport: 'http',
        host: '127.0.0.1',
        port: 0,
        logger,
    });
    return { url: running.url ?? '', lines };
}

describe('startServer over streamable HTTP', () => {
    it('reports the bound address', async () => {
        const { url, lines } = await serveHttp();
        expect(url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
        expect(url).not.toBe('http://127.0.0.1:0');
        expect(lines).toEqual([`[metabase-mcp] INFO  Serving 1 tools on ${url}${HTTP_PATH}`]);
    });

    it('accepts only POST on the endpoint', async () => {
        const { url } = await serveHttp();
        expect((await fetch(`${url}${HTTP_PATH}`)).status).toBe(405);
        expect((await fetch(`${url}/elsewhere`, { method: 'POST' })).status).toBe(404);
    });

    it('serves tools to an MCP client', async () => {
        const { url } = await serveHttp();
        const client = new Client({ name: 'test-client', version: '0.0.0' });
        await client.connect(new StreamableHTTPClientTransport(new URL(`${url}${HTTP_PATH}`)));

        const listed = await client.listTools();
        expect(listed.tools.map(t => t.name)).toEqual(['echo_say']);

        const called = await client.callTool({ name: 'echo_say', arguments: { word: 'there' } });
        expect(called.content).toEqual([{ type: 'text', text: 'hi there' }]);

        await client.close();
    });
});
