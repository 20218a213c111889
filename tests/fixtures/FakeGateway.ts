/**
 * FakeGateway — In-memory Metabase for tests
 *
 * Serves canned documents by path, records every call, and can be told to
 * fail a given request.
 */
import type { Gateway, GatewayMethod } from '../../src/client/Gateway.js';
import type { ToolContext } from '../../src/context.js';
import { createToolContext } from '../../src/context.js';
import { createLogger, type Logger } from '../../src/observability/Logger.js';

export interface RecordedCall {
    readonly method: GatewayMethod;
    readonly path: string;
    readonly body?: unknown;
}

export class FakeGateway implements Gateway {
    readonly calls: RecordedCall[] = [];
    private readonly documents = new Map<string, unknown>();
    private readonly responses = new Map<string, unknown>();
    private readonly failures = new Map<string, Error>();

    /** Answer `GET path` with `document`. */
    serve(path: string, document: unknown): this {
        this.documents.set(path, document);
        return this;
    }

    /** Answer `method path` (a write) with `response`. Writes echo their body otherwise. */
    respond(method: GatewayMethod, path: string, response: unknown): this {
        this.responses.set(`${method} ${path}`, response);
        return this;
    }

    /** Reject `method path` with `error`. */
    fail(method: GatewayMethod, path: string, error: Error): this {
        this.failures.set(`${method} ${path}`, error);
        return this;
    }

    async get(path: string): Promise<unknown> {
        return this.send('GET', path);
    }

    async send(method: GatewayMethod, path: string, body?: unknown): Promise<unknown> {
        this.calls.push(body !== undefined ? { method, path, body } : { method, path });
        const key = `${method} ${path}`;
        const failure = this.failures.get(key);
        if (failure !== undefined) throw failure;
        if (method === 'GET') {
            if (!this.documents.has(path)) throw new Error(`FakeGateway: nothing served at ${path}`);
            return structuredClone(this.documents.get(path));
        }
        return this.responses.has(key) ? this.responses.get(key) : body;
    }

    /** Calls other than GET. */
    get writes(): RecordedCall[] {
        return this.calls.filter(c => c.method !== 'GET');
    }
}

/** Collected log lines, without colors. */
export function memoryLogger(level: Logger['level'] = 'debug'): { logger: Logger; lines: string[] } {
    const lines: string[] = [];
    const logger = createLogger({ level, colors: false, write: line => { lines.push(line); } });
    return { logger, lines };
}

export function fakeContext(gateway: FakeGateway = new FakeGateway()): ToolContext {
    return createToolContext(gateway, memoryLogger('silent').logger);
}
