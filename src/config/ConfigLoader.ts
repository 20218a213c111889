/**
 * ConfigLoader — Layered configuration
 *
 * Priority (highest first):
 *   1. CLI flags
 *   2. Environment variables
 *   3. `--config <path>`, or `metabase-mcp.yaml` / `.yml` / `.json` in cwd
 *   4. Defaults
 *
 * @module
 */
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
    ConfigError,
    ConfigLayerSchema,
    ServerConfigSchema,
    type ConfigLayer,
    type ServerConfig,
} from './ServerConfig.js';

const CONFIG_FILENAMES = [
    'metabase-mcp.yaml',
    'metabase-mcp.yml',
    'metabase-mcp.json',
];

export interface LoadConfigOptions {
    /** Explicit config file, relative to `cwd` */
    readonly configPath?: string;
    /** Highest-priority overrides, usually from the CLI */
    readonly overrides?: ConfigLayer;
    /** Default: `process.env` */
    readonly env?: NodeJS.ProcessEnv;
    /** Default: `process.cwd()` */
    readonly cwd?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
    const cwd = options.cwd ?? process.cwd();
    const layers: ConfigLayer[] = [
        readConfigFile(cwd, options.configPath),
        envLayer(options.env ?? process.env),
        options.overrides ?? {},
    ];

    const result = ServerConfigSchema.safeParse(mergeLayers(layers));
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }
    return result.data;
}

/** Settings taken from the environment. Unset and empty variables are skipped. */
export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
    const read = (key: string): string | undefined => {
        const value = env[key]?.trim();
        return value !== undefined && value.length > 0 ? value : undefined;
    };
    const timeout = read('METABASE_TIMEOUT_MS');
    const port = read('PORT');
    const level = read('LOG_LEVEL')?.toLowerCase();

    const layer = ConfigLayerSchema.safeParse({
        metabase: defined({
            url: read('METABASE_URL'),
            apiKey: read('METABASE_API_KEY'),
            email: read('METABASE_USER_EMAIL'),
            password: read('METABASE_PASSWORD'),
            timeoutMs: timeout !== undefined ? Number(timeout) : undefined,
        }),
        server: defined({
            host: read('HOST'),
            port: port !== undefined ? Number(port) : undefined,
        }),
        log: defined({ level }),
    });
    if (!layer.success) {
        throw new ConfigError(layer.error.issues.map(i => `environment ${i.path.join('.')}: ${i.message}`));
    }
    return layer.data;
}

/** Merge layers key by key; a later layer's value replaces an earlier one. */
export function mergeLayers(layers: readonly ConfigLayer[]): ConfigLayer {
    return layers.reduce<ConfigLayer>((merged, layer) => ({
        metabase: { ...merged.metabase, ...defined(layer.metabase ?? {}) },
        server: { ...merged.server, ...defined(layer.server ?? {}) },
        log: { ...merged.log, ...defined(layer.log ?? {}) },
    }), {});
}

// ── Internal ─────────────────────────────────────────────

function readConfigFile(cwd: string, configPath: string | undefined): ConfigLayer {
    let path: string | undefined;
    if (configPath !== undefined) {
        path = resolve(cwd, configPath);
        if (!existsSync(path)) {
            throw new ConfigError([`config file not found: "${path}"`]);
        }
    } else {
        path = CONFIG_FILENAMES.map(name => join(cwd, name)).find(candidate => existsSync(candidate));
    }
    if (path === undefined) return {};

    const content = readFileSync(path, 'utf-8');
    let raw: unknown;
    try {
        raw = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError([`${path}: ${reason}`]);
    }

    const layer = ConfigLayerSchema.safeParse(raw ?? {});
    if (!layer.success) {
        throw new ConfigError(layer.error.issues.map(i => `${path}: ${i.path.join('.')}: ${i.message}`));
    }
    return layer.data;
}

/** Drop the keys whose value is `undefined`. */
function defined<T extends object>(value: T): Partial<T> {
    const out: Partial<T> = {};
    for (const key of Object.keys(value)) {
        if (!isKeyOf(value, key)) continue;
        if (value[key] !== undefined) out[key] = value[key];
    }
    return out;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
    return key in value;
}
