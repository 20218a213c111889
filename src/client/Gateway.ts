// ============================================================================
// Gateway — The one collaborator the core talks to
// ============================================================================

export type GatewayMethod = 'GET' | 'POST' | 'PUT';

/**
 * Authenticated JSON access to the Metabase API.
 *
 * Paths are relative to the API root (`/dashboard/7`, not `/api/dashboard/7`).
 * A non-success response rejects with `GatewayError`; a request that never
 * completes rejects with `TransportError`.
 */
export interface Gateway {
    get(path: string): Promise<unknown>;
    send(method: GatewayMethod, path: string, body?: unknown): Promise<unknown>;
}

// ── Events ───────────────────────────────────────────────

export interface GatewayRequestEvent {
    readonly type: 'request';
    readonly method: GatewayMethod;
    readonly path: string;
    readonly timestamp: number;
}

export interface GatewayResponseEvent {
    readonly type: 'response';
    readonly method: GatewayMethod;
    readonly path: string;
    readonly status: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

export interface GatewayFailureEvent {
    readonly type: 'failure';
    readonly method: GatewayMethod;
    readonly path: string;
    /** HTTP status, absent when no response arrived */
    readonly status?: number;
    readonly error: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

export type GatewayEvent = GatewayRequestEvent | GatewayResponseEvent | GatewayFailureEvent;

export type GatewayObserver = (event: GatewayEvent) => void;
