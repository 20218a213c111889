// ============================================================================
// main — Wire configuration, client, registry and transport together
// ============================================================================

import dotenv from 'dotenv';
import { MetabaseClient } from '../client/MetabaseClient.js';
import { loadConfig } from '../config/ConfigLoader.js';
import { metabaseAuth } from '../config/ServerConfig.js';
import { createToolContext } from '../context.js';
import { createDebugObserver } from '../observability/DebugObserver.js';
import { createLogger } from '../observability/Logger.js';
import { startServer, type RunningServer } from '../server/startServer.js';
import { createRegistry } from '../tools/index.js';
import { HELP, parseCliArgs } from './args.js';

export const SERVER_NAME = 'metabase-mcp';
export const SERVER_VERSION = '0.1.0';

/**
 * Start the server described by `argv` and the environment.
 * Returns `undefined` when only help was printed.
 */
export async function main(argv: readonly string[]): Promise<RunningServer | undefined> {
    const args = parseCliArgs(argv);
    if (args.help) {
        process.stderr.write(HELP);
        return undefined;
    }

    // Variables already set in the environment keep their values
    dotenv.config(args.envFile !== undefined ? { path: args.envFile } : {});

    const config = loadConfig({
        ...(args.configPath !== undefined ? { configPath: args.configPath } : {}),
        overrides: args.overrides,
    });

    const logger = createLogger({ level: config.log.level });
    const debug = createDebugObserver(logger);

    const client = new MetabaseClient({
        url: config.metabase.url,
        auth: metabaseAuth(config.metabase),
        timeout: config.metabase.timeoutMs,
        observer: event => debug({ type: 'gateway', event, timestamp: event.timestamp }),
    });
    logger.info(`Metabase ${config.metabase.url} (auth: ${client.authMethod})`);

    const context = createToolContext(client, logger);
    return startServer({
        name: SERVER_NAME,
        version: SERVER_VERSION,
        registry: createRegistry(debug),
        contextFactory: () => context,
        transport: config.server.transport,
        host: config.server.host,
        port: config.server.port,
        logger,
    });
}
