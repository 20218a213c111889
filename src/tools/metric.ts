/**
 * Metric tools — reusable single-aggregation definitions
 *
 * Look for an existing metric with `metric_find` before aggregating ad hoc:
 * a metric keeps one definition of a number across every question that uses it.
 *
 * @module
 */
import { z } from 'zod';
import { action, type ToolContext } from '../context.js';
import { CardSchema, ClauseSchema, parseDocument } from '../domain/documents.js';
import { ValidationError, withOperation } from '../errors.js';
import { buildMetricCard, renameMetricCard } from '../metrics/MetricDefinition.js';
import { buildQuery, combineFilters, metricRef, toDatasetQuery } from '../query/QueryBuilder.js';
import { defineTool } from '../server/defineTool.js';
import { success } from '../server/response.js';
import { IdSchema } from './params.js';
import { rowCount } from './query.js';

export const metricTools = defineTool<ToolContext>('metric', {
    description: 'Saved metrics',
    actions: {
        find: action({
            description:
                'Find the saved metrics defined on a table. An empty list means no metric exists yet; ' +
                'consider metric_create instead of aggregating ad hoc.',
            readOnly: true,
            params: z.object({
                table_id: IdSchema,
                database_id: IdSchema.optional(),
            }),
            handler: async (ctx, args) => {
                const metrics = await ctx.metrics.find(args.table_id, args.database_id);
                ctx.logger.info(`Found ${metrics.length} metrics on table ${args.table_id}`);
                if (metrics.length === 0) {
                    return success({
                        metrics: [],
                        hint: `No metric is defined on table ${args.table_id}. Create one with metric_create to standardize this calculation.`,
                    });
                }
                return success({ metrics });
            },
        }),

        create: action({
            description:
                'Save a metric: one aggregation on a table, optionally filtered. The aggregation ' +
                'is named after the metric, e.g. aggregation ["sum", ["field", 81, null]].',
            params: z.object({
                name: z.string().min(1),
                database_id: IdSchema,
                table_id: IdSchema,
                aggregation: ClauseSchema,
                filters: z.array(ClauseSchema).optional(),
                breakouts: z.array(ClauseSchema).optional(),
                description: z.string().optional(),
                collection_id: IdSchema.optional(),
            }),
            handler: async (ctx, args) => {
                const filter = args.filters !== undefined ? combineFilters(args.filters) : undefined;
                const payload = buildMetricCard({
                    name: args.name,
                    databaseId: args.database_id,
                    tableId: args.table_id,
                    aggregation: args.aggregation,
                    ...(filter !== undefined ? { filter } : {}),
                    ...(args.breakouts !== undefined ? { breakouts: args.breakouts } : {}),
                    ...(args.description !== undefined ? { description: args.description } : {}),
                    ...(args.collection_id !== undefined ? { collectionId: args.collection_id } : {}),
                });
                const created = await withOperation('create_metric', () => ctx.gateway.send('POST', '/card', payload));
                ctx.logger.info(`Created metric "${args.name}" on table ${args.table_id}`);
                return success(created);
            },
        }),

        rename: action({
            description: 'Rename a metric. Both the card and the label of its aggregated column change.',
            idempotent: true,
            params: z.object({
                metric_id: IdSchema,
                name: z.string().min(1),
            }),
            handler: async (ctx, args) => {
                const updated = await withOperation('rename_metric', async () => {
                    const card = parseDocument(CardSchema, await ctx.gateway.get(`/card/${args.metric_id}`), 'card');
                    if (card.type !== 'metric') {
                        throw new ValidationError(`Card ${card.id} is a ${card.type ?? 'question'}, not a metric`, { field: 'metric_id' });
                    }
                    return ctx.gateway.send('PUT', `/card/${card.id}`, renameMetricCard(card, args.name));
                });
                ctx.logger.info(`Renamed metric ${args.metric_id} to "${args.name}"`);
                return success(updated);
            },
        }),

        query: action({
            description: 'Compute a saved metric, optionally broken out and filtered.',
            readOnly: true,
            params: z.object({
                database_id: IdSchema,
                table_id: IdSchema,
                metric_id: IdSchema,
                breakouts: z.array(ClauseSchema).optional(),
                filters: z.array(ClauseSchema).optional(),
                limit: z.number().int().positive().optional(),
            }),
            handler: async (ctx, args) => {
                const filter = args.filters !== undefined ? combineFilters(args.filters) : undefined;
                const query = buildQuery({
                    sourceTable: args.table_id,
                    aggregations: [metricRef(args.metric_id)],
                    ...(args.breakouts !== undefined ? { breakouts: args.breakouts } : {}),
                    ...(filter !== undefined ? { filter } : {}),
                    ...(args.limit !== undefined ? { limit: args.limit } : {}),
                });
                const result = await withOperation('query_metric',
                    () => ctx.gateway.send('POST', '/dataset', toDatasetQuery(args.database_id, query)));
                ctx.logger.info(`Metric ${args.metric_id} returned ${rowCount(result) ?? 0} rows`);
                return success(result);
            },
        }),
    },
});
