/**
 * Command-line flags of `metabase-mcp`
 *
 * @module
 */
import { ConfigError, type ConfigLayer, type TransportKind } from '../config/ServerConfig.js';
import { isLogLevel, type LogLevel } from '../observability/Logger.js';

export interface CliArgs {
    readonly help: boolean;
    readonly configPath?: string;
    /** `.env` file to load before reading the environment */
    readonly envFile?: string;
    /** Settings given as flags; they win over every other source */
    readonly overrides: ConfigLayer;
}

/**
 * Parse `argv` (without the node and script entries).
 *
 * @throws {ConfigError} On an unknown flag or a flag missing its value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
    let help = false;
    let configPath: string | undefined;
    let envFile: string | undefined;
    let transport: TransportKind | undefined;
    let host: string | undefined;
    let port: number | undefined;
    let url: string | undefined;
    let level: LogLevel | undefined;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const value = (): string => {
            const next = argv[++i];
            if (next === undefined || next.startsWith('--')) {
                throw new ConfigError([`${arg ?? ''} needs a value`]);
            }
            return next;
        };

        switch (arg) {
            case '-h':
            case '--help':
                help = true;
                break;
            case '-c':
            case '--config':
                configPath = value();
                break;
            case '--env-file':
                envFile = value();
                break;
            case '--stdio':
                transport = 'stdio';
                break;
            case '--sse':
                transport = 'sse';
                break;
            case '--http':
                transport = 'http';
                break;
            case '--host':
                host = value();
                break;
            case '--port': {
                const raw = value();
                port = Number(raw);
                if (!Number.isInteger(port)) throw new ConfigError([`--port: "${raw}" is not a port number`]);
                break;
            }
            case '--url':
                url = value();
                break;
            case '--log-level': {
                const raw = value().toLowerCase();
                if (!isLogLevel(raw)) {
                    throw new ConfigError([`--log-level: "${raw}" is not one of debug, info, warn, error, silent`]);
                }
                level = raw;
                break;
            }
            default:
                throw new ConfigError([`unknown option "${arg ?? ''}" (see --help)`]);
        }
    }

    const server = {
        ...(transport !== undefined ? { transport } : {}),
        ...(host !== undefined ? { host } : {}),
        ...(port !== undefined ? { port } : {}),
    };
    const overrides: ConfigLayer = {
        ...(url !== undefined ? { metabase: { url } } : {}),
        ...(Object.keys(server).length > 0 ? { server } : {}),
        ...(level !== undefined ? { log: { level } } : {}),
    };

    return {
        help,
        overrides,
        ...(configPath !== undefined ? { configPath } : {}),
        ...(envFile !== undefined ? { envFile } : {}),
    };
}

export const HELP = `
metabase-mcp — MCP server for Metabase

USAGE:
  metabase-mcp [options]

OPTIONS:
  -c, --config <file>     Config file (default: auto-detect metabase-mcp.yaml)
  --env-file <file>       Load environment variables from this file (default: .env)
  --stdio                 Serve on stdin/stdout (default)
  --sse                   Serve over SSE: GET /sse, POST /messages
  --http                  Serve over streamable HTTP: POST /mcp
  --host <address>        Bind address for --sse and --http (default: 0.0.0.0)
  --port <number>         Port for --sse and --http (default: 8000)
  --url <url>             Metabase URL (overrides METABASE_URL)
  --log-level <level>     debug | info | warn | error | silent (default: info)
  -h, --help              Show this help message

ENVIRONMENT:
  METABASE_URL            Metabase instance, e.g. https://metabase.example.com
  METABASE_API_KEY        API key (preferred)
  METABASE_USER_EMAIL     Email for session login, with METABASE_PASSWORD
  METABASE_PASSWORD
  METABASE_TIMEOUT_MS     Per-request timeout (default: 30000)
  HOST, PORT, LOG_LEVEL

CONFIG FILE (metabase-mcp.yaml):
  metabase:
    url: https://metabase.example.com
    timeoutMs: 30000
  server:
    transport: sse
    port: 8000
  log:
    level: debug
`;
