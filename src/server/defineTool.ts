/**
 * defineTool — Declarative tool groups
 *
 * A group bundles related actions under one name. Every action is exposed
 * as its own MCP tool named `<group>_<action>`, with its own input schema
 * and annotations.
 *
 * @example
 * ```typescript
 * const action = actionFor<ToolContext>();
 *
 * export const collectionTools = defineTool<ToolContext>('collection', {
 *     description: 'Metabase collections',
 *     actions: {
 *         list: action({
 *             description: 'List collections',
 *             readOnly: true,
 *             params: z.object({}),
 *             handler: async (ctx) => toonSuccess(await ctx.gateway.get('/collection')),
 *         }),
 *     },
 * });
 * ```
 *
 * @module
 */
import type { AnyZodObject, ZodIssue, z } from 'zod';
import type { ToolResponse } from './response.js';
import type { MiddlewareFn } from './middleware.js';

// ============================================================================
// Actions
// ============================================================================

export interface ActionDef<TContext, S extends AnyZodObject> {
    description: string;
    params: S;
    /** No side effects */
    readOnly?: boolean;
    /** Removes or replaces existing data */
    destructive?: boolean;
    /** Repeating the call with the same arguments changes nothing further */
    idempotent?: boolean;
    handler: (ctx: TContext, args: z.output<S>) => Promise<ToolResponse>;
}

export type ParsedCall<TContext> =
    | { readonly ok: true; readonly run: (ctx: TContext) => Promise<ToolResponse> }
    | { readonly ok: false; readonly issues: readonly ZodIssue[] };

/** An action with its argument type erased behind `parse`. */
export interface ToolAction<TContext> {
    readonly description: string;
    readonly schema: AnyZodObject;
    readonly readOnly: boolean;
    readonly destructive: boolean;
    readonly idempotent: boolean;
    parse(args: Record<string, unknown>): ParsedCall<TContext>;
}

/**
 * Action factory bound to a context type, so that each action's argument
 * type is inferred from its own `params` schema.
 */
export function actionFor<TContext>() {
    return <S extends AnyZodObject>(def: ActionDef<TContext, S>): ToolAction<TContext> => ({
        description: def.description,
        schema: def.params,
        readOnly: def.readOnly ?? false,
        destructive: def.destructive ?? false,
        idempotent: def.idempotent ?? false,
        parse(args) {
            const parsed = def.params.safeParse(args);
            if (!parsed.success) return { ok: false, issues: parsed.error.issues };
            const data: z.output<S> = parsed.data;
            return { ok: true, run: ctx => def.handler(ctx, data) };
        },
    });
}

// ============================================================================
// Groups
// ============================================================================

export interface ToolGroupConfig<TContext> {
    description: string;
    /** Applied to every action of the group, first one outermost */
    middleware?: MiddlewareFn<TContext>[];
    actions: Record<string, ToolAction<TContext>>;
}

export interface ToolGroup<TContext> {
    readonly name: string;
    readonly description: string;
    readonly middleware: readonly MiddlewareFn<TContext>[];
    readonly actions: ReadonlyMap<string, ToolAction<TContext>>;
}

const NAME_PATTERN = /^[a-z][a-z0-9]*(?:_[a-z0-9]+)*$/;

export function defineTool<TContext>(name: string, config: ToolGroupConfig<TContext>): ToolGroup<TContext> {
    if (!NAME_PATTERN.test(name)) {
        throw new Error(`defineTool("${name}"): group names are lowercase snake_case.`);
    }
    const actions = new Map<string, ToolAction<TContext>>();
    for (const [key, action] of Object.entries(config.actions)) {
        if (!NAME_PATTERN.test(key)) {
            throw new Error(`defineTool("${name}"): action "${key}" is not lowercase snake_case.`);
        }
        actions.set(key, action);
    }
    if (actions.size === 0) {
        throw new Error(`defineTool("${name}"): a group needs at least one action.`);
    }
    return {
        name,
        description: config.description,
        middleware: [...(config.middleware ?? [])],
        actions,
    };
}
