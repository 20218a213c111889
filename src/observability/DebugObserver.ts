/**
 * DebugObserver — Typed events from the tool pipeline
 *
 * The registry emits one event per pipeline stage of a tool call, and the
 * Metabase client's request events are forwarded as `gateway` events, so
 * one observer sees a call from routing down to the HTTP round trip.
 *
 * ```
 * [metabase-mcp] DEBUG route     dashboard_copy_tab
 * [metabase-mcp] DEBUG validate  dashboard_copy_tab ✓ 0.2ms
 * [metabase-mcp] DEBUG gateway   GET /dashboard/4 → 200 41ms
 * [metabase-mcp] INFO  execute   dashboard_copy_tab ✓ 97.0ms
 * ```
 *
 * @module
 */
import type { GatewayEvent } from '../client/Gateway.js';
import type { Logger } from './Logger.js';

// ============================================================================
// Event Types
// ============================================================================

/** An incoming call was matched to a tool. First event of every call. */
export interface RouteEvent {
    readonly type: 'route';
    readonly tool: string;
    readonly timestamp: number;
}

/** Arguments were parsed against the tool's schema (pass or fail). */
export interface ValidateEvent {
    readonly type: 'validate';
    readonly tool: string;
    readonly valid: boolean;
    readonly error?: string;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** The handler returned. `isError` reflects the response, not an exception. */
export interface ExecuteEvent {
    readonly type: 'execute';
    readonly tool: string;
    readonly durationMs: number;
    readonly isError: boolean;
    readonly timestamp: number;
}

/** The handler threw, or the tool does not exist. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly tool: string;
    readonly error: string;
    readonly step: 'route' | 'validate' | 'execute';
    readonly timestamp: number;
}

/** A Metabase API round trip. */
export interface GatewayDebugEvent {
    readonly type: 'gateway';
    readonly event: GatewayEvent;
    readonly timestamp: number;
}

export type DebugEvent =
    | RouteEvent
    | ValidateEvent
    | ExecuteEvent
    | ErrorEvent
    | GatewayDebugEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/** Render debug events through `logger`. */
export function createDebugObserver(logger: Logger): DebugObserverFn {
    return (event: DebugEvent): void => {
        switch (event.type) {
            case 'route':
                logger.debug(`route     ${event.tool}`);
                break;

            case 'validate': {
                const status = event.valid ? '✓' : `✗ ${event.error ?? ''}`;
                logger.debug(`validate  ${event.tool} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'execute': {
                const icon = event.isError ? '✗' : '✓';
                logger.info(`execute   ${event.tool} ${icon} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                logger.warn(`error     ${event.tool} [${event.step}] ${event.error}`);
                break;

            case 'gateway':
                logger.debug(`gateway   ${describeGatewayEvent(event.event)}`);
                break;
        }
    };
}

function describeGatewayEvent(event: GatewayEvent): string {
    const target = `${event.method} ${event.path}`;
    switch (event.type) {
        case 'request':
            return `${target} …`;
        case 'response':
            return `${target} → ${event.status} ${event.durationMs}ms`;
        case 'failure':
            return `${target} ✗ ${event.status ?? '-'} ${event.error} ${event.durationMs}ms`;
    }
}
