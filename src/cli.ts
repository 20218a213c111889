#!/usr/bin/env node
/**
 * CLI Entry Point — metabase-mcp
 *
 * Usage:
 *   metabase-mcp [--stdio | --sse | --http] [--config <file>] [--port <n>]
 *
 * @module
 */
import { main } from './cli/main.js';
import { ConfigError } from './config/ServerConfig.js';

try {
    const running = await main(process.argv.slice(2));
    if (running !== undefined) {
        const shutdown = (): void => {
            running.close().then(
                () => process.exit(0),
                (err: unknown) => {
                    console.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
                    process.exit(1);
                },
            );
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    }
} catch (err) {
    if (err instanceof ConfigError) {
        console.error(err.message);
    } else {
        console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
    }
    process.exit(1);
}
