// ============================================================================
// MetabaseClient — HTTP client for the Metabase REST API
// ============================================================================

import { GatewayError, TransportError } from '../errors.js';
import type { Gateway, GatewayMethod, GatewayObserver } from './Gateway.js';

export type MetabaseAuth =
    | { readonly kind: 'api_key'; readonly apiKey: string }
    | { readonly kind: 'session'; readonly email: string; readonly password: string };

export interface MetabaseClientConfig {
    readonly url: string;
    readonly auth: MetabaseAuth;
    /** Per-request timeout in ms (default: 30000) */
    readonly timeout?: number;
    readonly observer?: GatewayObserver;
}

/**
 * Fetch-based {@link Gateway} for a Metabase instance.
 *
 * API keys go out as `X-API-KEY`. Email/password credentials are exchanged
 * once for a session id (`POST /api/session`), sent as `X-Metabase-Session`
 * on every later request. A 401 drops the session, so the next call logs in
 * again. Nothing is retried.
 */
export class MetabaseClient implements Gateway {
    private readonly baseUrl: string;
    private readonly auth: MetabaseAuth;
    private readonly timeout: number;
    private readonly observer: GatewayObserver | undefined;
    private session: Promise<string> | null = null;

    constructor(config: MetabaseClientConfig) {
        this.baseUrl = config.url.replace(/\/+$/, '');
        this.auth = config.auth;
        this.timeout = config.timeout ?? 30_000;
        this.observer = config.observer;
    }

    get authMethod(): MetabaseAuth['kind'] {
        return this.auth.kind;
    }

    async get(path: string): Promise<unknown> {
        return this.send('GET', path);
    }

    async send(method: GatewayMethod, path: string, body?: unknown): Promise<unknown> {
        const headers = await this.authHeaders();
        const session = this.session;
        try {
            return await this.request(method, path, headers, body);
        } catch (err) {
            // Expired or revoked session
            if (err instanceof GatewayError && err.status === 401 && this.auth.kind === 'session') {
                this.resetSession(session);
            }
            throw err;
        }
    }

    // ── Internal ──

    /** Forget `stale`, unless another call has already replaced it. */
    private resetSession(stale: Promise<string> | null): void {
        if (this.session === stale) this.session = null;
    }

    private async authHeaders(): Promise<Record<string, string>> {
        if (this.auth.kind === 'api_key') {
            return { 'X-API-KEY': this.auth.apiKey };
        }
        return { 'X-Metabase-Session': await this.sessionId(this.auth.email, this.auth.password) };
    }

    private sessionId(email: string, password: string): Promise<string> {
        if (this.session === null) {
            const pending = this.login(email, password);
            // A failed login must not poison later calls
            void pending.catch(() => {
                if (this.session === pending) this.session = null;
            });
            this.session = pending;
        }
        return this.session;
    }

    private async login(email: string, password: string): Promise<string> {
        const body = await this.request('POST', '/session', {}, { username: email, password });
        const id = typeof body === 'object' && body !== null && 'id' in body ? body.id : undefined;
        if (typeof id !== 'string' || id.length === 0) {
            throw new GatewayError({
                status: 200,
                method: 'POST',
                path: '/session',
                body: 'Authentication response did not contain a session id',
            });
        }
        return id;
    }

    private async request(
        method: GatewayMethod,
        path: string,
        headers: Record<string, string>,
        body?: unknown,
    ): Promise<unknown> {
        const started = Date.now();
        this.observer?.({ type: 'request', method, path, timestamp: started });

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeout);

        let response: Response;
        let text: string;
        try {
            response = await fetch(`${this.baseUrl}/api${path}`, {
                method,
                headers: {
                    'Content-Type': 'application/json',
                    'Accept': 'application/json',
                    ...headers,
                },
                ...(body !== undefined && method !== 'GET' ? { body: JSON.stringify(body) } : {}),
                signal: controller.signal,
            });
            text = await response.text();
        } catch (err) {
            const failure = new TransportError(method, path, err);
            this.emitFailure(method, path, started, failure.message);
            throw failure;
        } finally {
            clearTimeout(timer);
        }

        if (!response.ok) {
            const failure = new GatewayError({ status: response.status, method, path, body: text });
            this.emitFailure(method, path, started, failure.message, response.status);
            throw failure;
        }

        this.observer?.({
            type: 'response',
            method,
            path,
            status: response.status,
            durationMs: Date.now() - started,
            timestamp: Date.now(),
        });

        if (text.length === 0) return null;
        try {
            const parsed: unknown = JSON.parse(text);
            return parsed;
        } catch (err) {
            throw new TransportError(method, path, err);
        }
    }

    private emitFailure(
        method: GatewayMethod,
        path: string,
        started: number,
        error: string,
        status?: number,
    ): void {
        this.observer?.({
            type: 'failure',
            method,
            path,
            ...(status !== undefined ? { status } : {}),
            error,
            durationMs: Date.now() - started,
            timestamp: Date.now(),
        });
    }
}
