/**
 * Dashboard tools
 *
 * The write tools fetch the dashboard, change it locally and write the
 * changed lists back in one request. Calls touching the same dashboard are
 * queued so one never overwrites another's result.
 *
 * @module
 */
import { z } from 'zod';
import { action, type ToolContext } from '../context.js';
import type { DashcardDraft } from '../dashboard/drafts.js';
import type { Dashboard } from '../domain/documents.js';
import {
    DashcardSchema,
    ParameterMappingSchema,
    ParameterSchema,
} from '../domain/documents.js';
import { withOperation } from '../errors.js';
import { listItems, parseItems } from '../format/lists.js';
import { defineTool } from '../server/defineTool.js';
import { serializeBy } from '../server/middleware.js';
import { success, toonSuccess } from '../server/response.js';
import { IdSchema } from './params.js';

const DashboardSummarySchema = z.object({
    id: z.number().int(),
    name: z.string(),
    description: z.string().nullable().optional(),
    collection_id: z.number().int().nullable().optional(),
    archived: z.boolean().optional(),
});

/** Queue keys of the dashboards a call writes to. */
export function dashboardKeys(args: Record<string, unknown>): string[] {
    return ['dashboard_id', 'target_dashboard_id']
        .map(key => args[key])
        .filter((id): id is number => typeof id === 'number')
        .map(id => `dashboard:${id}`);
}

/**
 * A dashboard's layout. Dashcards and parameters are complete, so they can be
 * edited and written back with `set_cards` / `set_parameters`; only the card
 * document Metabase embeds in each dashcard is left out.
 */
export function describeDashboard(dashboard: Dashboard): Record<string, unknown> {
    return {
        id: dashboard.id,
        name: dashboard.name,
        description: dashboard.description ?? null,
        collection_id: dashboard.collection_id ?? null,
        tabs: dashboard.tabs,
        dashcards: dashboard.dashcards.map(dc => Object.fromEntries(
            Object.entries(dc).filter(([key]) => key !== 'card'),
        )),
        parameters: dashboard.parameters,
    };
}

function placed(dashcard: DashcardDraft): Record<string, unknown> {
    return {
        id: dashcard.id,
        card_id: dashcard.card_id,
        dashboard_tab_id: dashcard.dashboard_tab_id ?? null,
        row: dashcard.row,
        col: dashcard.col,
        size_x: dashcard.size_x,
        size_y: dashcard.size_y,
    };
}

export const dashboardTools = defineTool<ToolContext>('dashboard', {
    description: 'Dashboards: layout, tabs and filters',
    middleware: [serializeBy<ToolContext>(dashboardKeys)],
    actions: {
        list: action({
            description: 'List dashboards.',
            readOnly: true,
            params: z.object({}),
            handler: async (ctx) => {
                const dashboards = parseItems(DashboardSummarySchema, listItems(await withOperation('list_dashboards', () => ctx.gateway.get('/dashboard')), 'dashboard list'));
                ctx.logger.info(`Retrieved ${dashboards.length} dashboards`);
                return toonSuccess(dashboards.map(d => ({
                    id: d.id,
                    name: d.name,
                    collection_id: d.collection_id ?? null,
                    archived: d.archived ?? false,
                    description: d.description ?? null,
                })));
            },
        }),

        get: action({
            description: 'Get a dashboard\'s tabs, dashcards (card placements) and filter parameters.',
            readOnly: true,
            params: z.object({ dashboard_id: IdSchema }),
            handler: async (ctx, args) => {
                const dashboard = await ctx.dashboards.getDashboard(args.dashboard_id);
                return success(describeDashboard(dashboard));
            },
        }),

        create: action({
            description: 'Create an empty dashboard.',
            params: z.object({
                name: z.string().min(1),
                description: z.string().optional(),
                collection_id: IdSchema.optional(),
            }),
            handler: async (ctx, args) => {
                const body = {
                    name: args.name,
                    ...(args.description ? { description: args.description } : {}),
                    ...(args.collection_id !== undefined ? { collection_id: args.collection_id } : {}),
                };
                const created = await withOperation('create_dashboard', () => ctx.gateway.send('POST', '/dashboard', body));
                ctx.logger.info(`Created dashboard "${args.name}"`);
                return success(created);
            },
        }),

        update: action({
            description: 'Change a dashboard\'s name, description or collection, or archive it.',
            idempotent: true,
            params: z.object({
                dashboard_id: IdSchema,
                name: z.string().min(1).optional(),
                description: z.string().nullable().optional(),
                collection_id: IdSchema.nullable().optional(),
                archived: z.boolean().optional(),
            }),
            handler: async (ctx, args) => {
                const outcome = await ctx.dashboards.updateDetails(args.dashboard_id, {
                    ...(args.name !== undefined ? { name: args.name } : {}),
                    ...(args.description !== undefined ? { description: args.description } : {}),
                    ...(args.collection_id !== undefined ? { collectionId: args.collection_id } : {}),
                    ...(args.archived !== undefined ? { archived: args.archived } : {}),
                });
                return success({ dashboard_id: outcome.dashboardId, updated: Object.keys(outcome.update) });
            },
        }),

        add_card: action({
            description:
                'Place a saved question on a dashboard. Defaults: the first tab, column 0, below ' +
                'the existing cards of that tab, 12 columns wide and 6 rows high.',
            params: z.object({
                dashboard_id: IdSchema,
                card_id: IdSchema,
                tab_id: z.number().int().optional(),
                row: z.number().int().min(0).optional(),
                col: z.number().int().min(0).max(23).optional(),
                size_x: z.number().int().min(1).max(24).optional(),
                size_y: z.number().int().min(1).optional(),
                visualization_settings: z.record(z.unknown()).optional(),
                parameter_mappings: z.array(ParameterMappingSchema).optional()
                    .describe('Bindings of dashboard filters to this card'),
            }),
            handler: async (ctx, args) => {
                const outcome = await ctx.dashboards.addCard(args.dashboard_id, {
                    cardId: args.card_id,
                    ...(args.tab_id !== undefined ? { tabId: args.tab_id } : {}),
                    ...(args.row !== undefined ? { row: args.row } : {}),
                    ...(args.col !== undefined ? { col: args.col } : {}),
                    ...(args.size_x !== undefined ? { sizeX: args.size_x } : {}),
                    ...(args.size_y !== undefined ? { sizeY: args.size_y } : {}),
                    ...(args.visualization_settings !== undefined ? { visualizationSettings: args.visualization_settings } : {}),
                    ...(args.parameter_mappings !== undefined ? { parameterMappings: args.parameter_mappings } : {}),
                });
                ctx.logger.info(`Added card ${args.card_id} to dashboard ${args.dashboard_id}`);
                return success({ dashboard_id: outcome.dashboardId, dashcard: placed(outcome.detail) });
            },
        }),

        remove_card: action({
            description: 'Remove one dashcard (card placement) from a dashboard. The saved question itself is kept.',
            destructive: true,
            params: z.object({
                dashboard_id: IdSchema,
                dashcard_id: z.number().int().describe('Dashcard id from dashboard_get, not the card id'),
            }),
            handler: async (ctx, args) => {
                const outcome = await ctx.dashboards.removeCard(args.dashboard_id, args.dashcard_id);
                ctx.logger.info(`Removed dashcard ${args.dashcard_id} from dashboard ${args.dashboard_id}`);
                return success({
                    dashboard_id: outcome.dashboardId,
                    removed_dashcard_id: args.dashcard_id,
                    remaining_dashcards: outcome.update.dashcards?.length ?? 0,
                });
            },
        }),

        set_parameters: action({
            description:
                'Replace the dashboard\'s whole filter parameter list. Parameters left out are ' +
                'deleted; read the current list with dashboard_get first to add or edit one.',
            destructive: true,
            idempotent: true,
            params: z.object({
                dashboard_id: IdSchema,
                parameters: z.array(ParameterSchema),
            }),
            handler: async (ctx, args) => {
                const outcome = await ctx.dashboards.replaceParameters(args.dashboard_id, args.parameters);
                ctx.logger.info(`Set ${args.parameters.length} parameters on dashboard ${args.dashboard_id}`);
                return success({ dashboard_id: outcome.dashboardId, parameters: args.parameters.map(p => p.id) });
            },
        }),

        set_cards: action({
            description:
                'Replace the dashboard\'s whole dashcard list, to move or resize cards or rewire ' +
                'filter mappings. Dashcards left out are removed; new ones take negative ids.',
            destructive: true,
            idempotent: true,
            params: z.object({
                dashboard_id: IdSchema,
                dashcards: z.array(DashcardSchema),
            }),
            handler: async (ctx, args) => {
                const outcome = await ctx.dashboards.replaceDashcards(args.dashboard_id, args.dashcards);
                ctx.logger.info(`Set ${args.dashcards.length} dashcards on dashboard ${args.dashboard_id}`);
                return success({ dashboard_id: outcome.dashboardId, dashcards: args.dashcards.length });
            },
        }),

        copy_tab: action({
            description:
                'Copy a tab with its cards onto another dashboard (or the same one) as a new tab. ' +
                'With include_filters, the filters those cards use are copied too, renamed with ' +
                '"_copy" when the target already has that id. Each call adds another tab.',
            params: z.object({
                source_dashboard_id: IdSchema,
                target_dashboard_id: IdSchema,
                tab_id: z.number().int(),
                include_filters: z.boolean().default(true),
                tab_name: z.string().min(1).optional().describe('Name of the new tab (default: the source tab\'s name)'),
            }),
            handler: async (ctx, args) => {
                const outcome = await ctx.dashboards.copyTab({
                    sourceDashboardId: args.source_dashboard_id,
                    targetDashboardId: args.target_dashboard_id,
                    tabId: args.tab_id,
                    includeFilters: args.include_filters,
                    ...(args.tab_name !== undefined ? { tabName: args.tab_name } : {}),
                });
                const plan = outcome.detail;
                ctx.logger.info(
                    `Copied tab ${args.tab_id} of dashboard ${args.source_dashboard_id} to dashboard ` +
                    `${args.target_dashboard_id} (${plan.dashcards.length} dashcards, ${plan.parameters.length} parameters)`,
                );
                return success({
                    target_dashboard_id: outcome.dashboardId,
                    tab: plan.tab,
                    dashcards: plan.dashcards.map(placed),
                    parameters_added: plan.parameters.map(p => p.id),
                    renamed_parameters: Object.fromEntries([...plan.renamed].filter(([from, to]) => from !== to)),
                });
            },
        }),
    },
});
