/**
 * Card tools — saved questions
 *
 * @module
 */
import { z } from 'zod';
import { action, type ToolContext } from '../context.js';
import { CardSchema } from '../domain/documents.js';
import { withOperation } from '../errors.js';
import { listItems, parseItems } from '../format/lists.js';
import { buildQuery, nativeDatasetQuery, toDatasetQuery } from '../query/QueryBuilder.js';
import { defineTool } from '../server/defineTool.js';
import { success, toonSuccess } from '../server/response.js';
import { IdSchema, QueryClausesShape, toQueryInput } from './params.js';
import { rowCount } from './query.js';

const CardDetailsShape = {
    name: z.string().min(1),
    description: z.string().optional(),
    collection_id: IdSchema.optional().describe('Collection to save the card in (default: the root collection)'),
    display: z.string().default('table').describe('Visualization type, e.g. table, bar, line, scalar'),
    visualization_settings: z.record(z.unknown()).optional(),
};

interface CardDetails {
    name: string;
    description?: string | undefined;
    collection_id?: number | undefined;
    display: string;
    visualization_settings?: Record<string, unknown> | undefined;
}

/** Fields of a `POST /card` body shared by native and structured cards. */
function cardEnvelope(databaseId: number, args: CardDetails): Record<string, unknown> {
    return {
        name: args.name,
        database_id: databaseId,
        display: args.display,
        visualization_settings: args.visualization_settings ?? {},
        ...(args.description ? { description: args.description } : {}),
        ...(args.collection_id !== undefined ? { collection_id: args.collection_id } : {}),
    };
}

export const cardTools = defineTool<ToolContext>('card', {
    description: 'Saved questions (cards)',
    actions: {
        list: action({
            description: 'List saved questions, models and metrics.',
            readOnly: true,
            params: z.object({
                type: z.enum(['question', 'model', 'metric']).optional()
                    .describe('Only return cards of this type'),
            }),
            handler: async (ctx, args) => {
                const cards = parseItems(CardSchema, listItems(await withOperation('list_cards', () => ctx.gateway.get('/card')), 'card list'))
                    .filter(card => args.type === undefined || card.type === args.type);
                ctx.logger.info(`Retrieved ${cards.length} cards`);
                return toonSuccess(cards.map(card => ({
                    id: card.id,
                    name: card.name,
                    type: card.type ?? null,
                    database_id: card.database_id ?? null,
                    collection_id: card.collection_id ?? null,
                    description: card.description ?? null,
                })));
            },
        }),

        execute: action({
            description: 'Run a saved question and return its result rows.',
            readOnly: true,
            params: z.object({
                card_id: IdSchema,
                parameters: z.array(z.record(z.unknown())).optional()
                    .describe('Parameter values, e.g. [{"type": "category", "target": [...], "value": "Gizmo"}]'),
            }),
            handler: async (ctx, args) => {
                const body = args.parameters !== undefined && args.parameters.length > 0
                    ? { parameters: args.parameters }
                    : {};
                const result = await withOperation('execute_card', () => ctx.gateway.send('POST', `/card/${args.card_id}/query`, body));
                ctx.logger.info(`Card ${args.card_id} returned ${rowCount(result) ?? 0} rows`);
                return success(result);
            },
        }),

        create_native: action({
            description: 'Save a native SQL query as a new question.',
            params: z.object({
                database_id: IdSchema,
                query: z.string().min(1).describe('SQL text'),
                ...CardDetailsShape,
            }),
            handler: async (ctx, args) => {
                const body = {
                    ...cardEnvelope(args.database_id, args),
                    dataset_query: nativeDatasetQuery(args.database_id, args.query),
                };
                const created = await withOperation('create_card', () => ctx.gateway.send('POST', '/card', body));
                ctx.logger.info(`Created native card "${args.name}"`);
                return success(created);
            },
        }),

        create_structured: action({
            description:
                'Save a structured (MBQL) query as a new question. Takes the same clause ' +
                'arguments as query_run_structured and produces the identical query.',
            params: z.object({
                database_id: IdSchema,
                source_table: z.union([IdSchema, z.string().regex(/^card__\d+$/)]),
                ...QueryClausesShape,
                ...CardDetailsShape,
            }),
            handler: async (ctx, args) => {
                const query = buildQuery(toQueryInput(args.source_table, args));
                const body = {
                    ...cardEnvelope(args.database_id, args),
                    ...(typeof args.source_table === 'number' ? { table_id: args.source_table } : {}),
                    dataset_query: toDatasetQuery(args.database_id, query),
                };
                const created = await withOperation('create_card', () => ctx.gateway.send('POST', '/card', body));
                ctx.logger.info(`Created structured card "${args.name}"`);
                return success(created);
            },
        }),
    },
});
