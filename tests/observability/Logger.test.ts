import { describe, it, expect } from 'vitest';
import { createDebugObserver } from '../../src/observability/DebugObserver.js';
import { createLogger, isLogLevel } from '../../src/observability/Logger.js';
import { memoryLogger } from '../fixtures/FakeGateway.js';

describe('createLogger', () => {
    it('writes prefixed, labelled lines', () => {
        const lines: string[] = [];
        const logger = createLogger({ level: 'debug', colors: false, write: line => { lines.push(line); } });
        logger.debug('a');
        logger.info('b');
        logger.warn('c');
        logger.error('d');
        expect(lines).toEqual([
            '[metabase-mcp] DEBUG a',
            '[metabase-mcp] INFO  b',
            '[metabase-mcp] WARN  c',
            '[metabase-mcp] ERROR d',
        ]);
    });

    it('drops lines below its level', () => {
        const { logger, lines } = memoryLogger('warn');
        logger.info('hidden');
        logger.warn('shown');
        expect(lines).toEqual(['[metabase-mcp] WARN  shown']);
        expect(logger.level).toBe('warn');
    });

    it('writes nothing when silent', () => {
        const { logger, lines } = memoryLogger('silent');
        logger.error('hidden');
        expect(lines).toEqual([]);
    });

    it('recognizes level names', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
    });
});

describe('createDebugObserver', () => {
    it('renders pipeline events', () => {
        const { logger, lines } = memoryLogger('debug');
        const debug = createDebugObserver(logger);

        debug({ type: 'route', tool: 'dashboard_get', timestamp: 0 });
        debug({ type: 'validate', tool: 'dashboard_get', valid: true, durationMs: 0.2, timestamp: 0 });
        debug({ type: 'validate', tool: 'dashboard_get', valid: false, error: '1 invalid field(s)', durationMs: 0.1, timestamp: 0 });
        debug({ type: 'execute', tool: 'dashboard_get', durationMs: 12, isError: false, timestamp: 0 });
        debug({ type: 'error', tool: 'dashboard_get', error: 'boom', step: 'execute', timestamp: 0 });

        expect(lines).toEqual([
            '[metabase-mcp] DEBUG route     dashboard_get',
            '[metabase-mcp] DEBUG validate  dashboard_get ✓ 0.2ms',
            '[metabase-mcp] DEBUG validate  dashboard_get ✗ 1 invalid field(s) 0.1ms',
            '[metabase-mcp] INFO  execute   dashboard_get ✓ 12.0ms',
            '[metabase-mcp] WARN  error     dashboard_get [execute] boom',
        ]);
    });

    it('renders gateway events', () => {
        const { logger, lines } = memoryLogger('debug');
        const debug = createDebugObserver(logger);

        debug({ type: 'gateway', timestamp: 0, event: { type: 'request', method: 'GET', path: '/card', timestamp: 0 } });
        debug({ type: 'gateway', timestamp: 0, event: { type: 'response', method: 'GET', path: '/card', status: 200, durationMs: 41, timestamp: 0 } });
        debug({ type: 'gateway', timestamp: 0, event: { type: 'failure', method: 'PUT', path: '/dashboard/1', error: 'timeout', durationMs: 30000, timestamp: 0 } });

        expect(lines).toEqual([
            '[metabase-mcp] DEBUG gateway   GET /card …',
            '[metabase-mcp] DEBUG gateway   GET /card → 200 41ms',
            '[metabase-mcp] DEBUG gateway   PUT /dashboard/1 ✗ - timeout 30000ms',
        ]);
    });
});
