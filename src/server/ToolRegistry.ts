/**
 * ToolRegistry — Flat exposition and routing of tool groups
 *
 * Each action of each registered group becomes one MCP tool named
 * `<group>_<action>`. A call runs through a fixed pipeline:
 *
 *   route → validate (zod) → group middleware → handler
 *
 * and every stage reports to the debug observer. Thrown errors never reach
 * the MCP transport: they are rendered as `<tool_error>` responses.
 *
 * @module
 */
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    type Tool as McpTool,
} from '@modelcontextprotocol/sdk/types.js';
import type { AnyZodObject } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import type { ToolAction, ToolGroup } from './defineTool.js';
import { errorResponse } from './errorResponse.js';
import { wrapChain } from './middleware.js';
import { toolError, type ToolResponse } from './response.js';
import { formatValidationError } from './ValidationErrorFormatter.js';

interface Route<TContext> {
    readonly name: string;
    readonly group: ToolGroup<TContext>;
    readonly action: ToolAction<TContext>;
}

export interface ToolRegistryOptions {
    readonly debug?: DebugObserverFn;
}

export interface AttachOptions<TContext> {
    /** Builds the context handed to handlers, once per call */
    readonly contextFactory: () => TContext | Promise<TContext>;
}

export class ToolRegistry<TContext> {
    private readonly _routes = new Map<string, Route<TContext>>();
    private readonly _debug: DebugObserverFn | undefined;

    constructor(options: ToolRegistryOptions = {}) {
        this._debug = options.debug;
    }

    /**
     * Register a group.
     *
     * @throws If one of its flat tool names is already taken
     */
    register(group: ToolGroup<TContext>): void {
        const routes: Route<TContext>[] = [];
        for (const [key, action] of group.actions) {
            const name = `${group.name}_${key}`;
            if (this._routes.has(name)) {
                throw new Error(`Tool "${name}" is already registered.`);
            }
            routes.push({ name, group, action });
        }
        for (const route of routes) this._routes.set(route.name, route);
    }

    registerAll(...groups: ToolGroup<TContext>[]): void {
        for (const group of groups) this.register(group);
    }

    get toolNames(): string[] {
        return [...this._routes.keys()];
    }

    has(name: string): boolean {
        return this._routes.has(name);
    }

    /** MCP definitions of every registered tool, in registration order. */
    getAllTools(): McpTool[] {
        return [...this._routes.values()].map(route => toMcpTool(route));
    }

    /** Validate `args` and run the tool `name`. Never throws. */
    async routeCall(ctx: TContext, name: string, args: Record<string, unknown>): Promise<ToolResponse> {
        const started = Date.now();
        this._debug?.({ type: 'route', tool: name, timestamp: started });

        const route = this._routes.get(name);
        if (route === undefined) {
            this._debug?.({ type: 'error', tool: name, error: `Unknown tool: "${name}"`, step: 'route', timestamp: Date.now() });
            return toolError('UNKNOWN_TOOL', {
                message: `Tool "${name}" does not exist.`,
                suggestion: 'Check the available tools and call a valid one.',
                availableActions: this.toolNames,
            });
        }

        const validateStart = Date.now();
        const parsed = route.action.parse(args);
        if (!parsed.ok) {
            const text = formatValidationError(parsed.issues, name, args);
            this._debug?.({
                type: 'validate',
                tool: name,
                valid: false,
                error: `${parsed.issues.length} invalid field(s)`,
                durationMs: Date.now() - validateStart,
                timestamp: Date.now(),
            });
            return this.finish(name, started, { content: [{ type: 'text', text }], isError: true });
        }
        this._debug?.({ type: 'validate', tool: name, valid: true, durationMs: Date.now() - validateStart, timestamp: Date.now() });

        const chain = wrapChain<TContext>(parsedCtx => parsed.run(parsedCtx), route.group.middleware);
        let response: ToolResponse;
        try {
            response = await chain(ctx, args);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            this._debug?.({ type: 'error', tool: name, error: message, step: 'execute', timestamp: Date.now() });
            response = errorResponse(err);
        }
        return this.finish(name, started, response);
    }

    /** Serve `tools/list` and `tools/call` on `server`. */
    attachToServer(server: Server, options: AttachOptions<TContext>): void {
        server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.getAllTools(),
        }));

        server.setRequestHandler(CallToolRequestSchema, async request => {
            const ctx = await options.contextFactory();
            const response = await this.routeCall(ctx, request.params.name, request.params.arguments ?? {});
            return {
                content: response.content.map(c => ({ type: c.type, text: c.text })),
                ...(response.isError !== undefined ? { isError: response.isError } : {}),
            };
        });
    }

    // ── Internal ──

    private finish(name: string, started: number, response: ToolResponse): ToolResponse {
        this._debug?.({
            type: 'execute',
            tool: name,
            durationMs: Date.now() - started,
            isError: response.isError === true,
            timestamp: Date.now(),
        });
        return response;
    }
}

// ── Exposition ───────────────────────────────────────────

function toMcpTool<TContext>(route: Route<TContext>): McpTool {
    const { action } = route;
    const flags: string[] = [];
    if (action.destructive) flags.push('[DESTRUCTIVE]');
    if (action.readOnly) flags.push('[READ-ONLY]');

    return {
        name: route.name,
        description: [action.description, ...flags].join(' '),
        inputSchema: toInputSchema(action.schema),
        annotations: {
            readOnlyHint: action.readOnly,
            destructiveHint: action.destructive && !action.readOnly,
            ...(action.idempotent ? { idempotentHint: true } : {}),
        },
    };
}

function toInputSchema(schema: AnyZodObject): McpTool['inputSchema'] {
    const json = zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' });
    const properties = 'properties' in json && isRecord(json.properties) ? json.properties : {};
    const required = 'required' in json && Array.isArray(json.required)
        ? json.required.filter((key): key is string => typeof key === 'string')
        : [];
    return {
        type: 'object',
        properties,
        ...(required.length > 0 ? { required } : {}),
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
