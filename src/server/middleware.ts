// ============================================================================
// Middleware — (ctx, args, next) wrappers around tool handlers
// ============================================================================

import type { ToolResponse } from './response.js';
import { MutationSerializer } from './MutationSerializer.js';

export type ChainFn<TContext> = (ctx: TContext, args: Record<string, unknown>) => Promise<ToolResponse>;

export type MiddlewareFn<TContext> = (
    ctx: TContext,
    args: Record<string, unknown>,
    next: () => Promise<ToolResponse>,
) => Promise<ToolResponse>;

/**
 * Wrap `handler` in `middlewares`, the first one outermost.
 */
export function wrapChain<TContext>(
    handler: ChainFn<TContext>,
    middlewares: readonly MiddlewareFn<TContext>[],
): ChainFn<TContext> {
    let chain = handler;

    for (let i = middlewares.length - 1; i >= 0; i--) {
        const mw = middlewares[i];
        if (!mw) continue;
        const nextFn = chain;
        chain = (ctx, args) => mw(ctx, args, () => nextFn(ctx, args));
    }

    return chain;
}

/**
 * Run calls one at a time per key. `keysOf` picks the keys from the raw
 * arguments; a call with no key runs immediately, one with several keys
 * takes them in sorted order.
 */
export function serializeBy<TContext>(
    keysOf: (args: Record<string, unknown>) => readonly string[],
    serializer: MutationSerializer = new MutationSerializer(),
): MiddlewareFn<TContext> {
    return (_ctx, args, next) => {
        const keys = [...new Set(keysOf(args))].sort();
        const run = keys.reduceRight<() => Promise<ToolResponse>>(
            (inner, key) => () => serializer.serialize(key, inner),
            next,
        );
        return run();
    };
}
