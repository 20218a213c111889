/**
 * ServerConfig — Settings of the Metabase MCP server
 *
 * Resolved from (highest first) CLI flags, environment variables, a
 * `metabase-mcp.yaml` file and the defaults below. See `ConfigLoader`.
 *
 * @module
 */
import { z } from 'zod';
import type { MetabaseAuth } from '../client/MetabaseClient.js';
import { LOG_LEVELS } from '../observability/Logger.js';

export const TRANSPORTS = ['stdio', 'sse', 'http'] as const;
export type TransportKind = typeof TRANSPORTS[number];

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_PORT = 8000;

// ── Layers ───────────────────────────────────────────────

/** One source of settings. Every key is optional; later layers win. */
export const ConfigLayerSchema = z.object({
    metabase: z.object({
        url: z.string(),
        apiKey: z.string(),
        email: z.string(),
        password: z.string(),
        timeoutMs: z.number(),
    }).partial().strict().optional(),
    server: z.object({
        transport: z.enum(TRANSPORTS),
        host: z.string(),
        port: z.number(),
    }).partial().strict().optional(),
    log: z.object({
        level: z.enum(LOG_LEVELS),
    }).partial().strict().optional(),
}).strict();

export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;

// ── Resolved Config ──────────────────────────────────────

export const ServerConfigSchema = z.object({
    metabase: z.object({
        url: z.string().url(),
        apiKey: z.string().min(1).optional(),
        email: z.string().min(1).optional(),
        password: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    }).superRefine((value, ctx) => {
        if (value.apiKey !== undefined) return;
        if (value.email === undefined || value.password === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'set either an API key (METABASE_API_KEY) or both METABASE_USER_EMAIL and METABASE_PASSWORD',
                path: ['apiKey'],
            });
        }
    }),
    server: z.object({
        transport: z.enum(TRANSPORTS).default('stdio'),
        host: z.string().min(1).default(DEFAULT_HOST),
        port: z.number().int().min(1).max(65_535).default(DEFAULT_PORT),
    }).default({}),
    log: z.object({
        level: z.enum(LOG_LEVELS).default('info'),
    }).default({}),
});

export type ServerConfig = z.output<typeof ServerConfigSchema>;

/** Settings could not be read or do not validate. Lists every problem. */
export class ConfigError extends Error {
    readonly problems: readonly string[];

    constructor(problems: readonly string[]) {
        super(`Invalid configuration:\n${problems.map(p => `  - ${p}`).join('\n')}`);
        this.name = 'ConfigError';
        this.problems = [...problems];
    }
}

/** Credentials for `MetabaseClient`. An API key wins over email/password. */
export function metabaseAuth(config: ServerConfig['metabase']): MetabaseAuth {
    if (config.apiKey !== undefined) return { kind: 'api_key', apiKey: config.apiKey };
    if (config.email !== undefined && config.password !== undefined) {
        return { kind: 'session', email: config.email, password: config.password };
    }
    throw new ConfigError(['metabase.apiKey: no credentials configured']);
}
