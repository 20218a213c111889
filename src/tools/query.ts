/**
 * Query tools — run native SQL or structured (MBQL) queries without saving them
 *
 * @module
 */
import { z } from 'zod';
import { action, type ToolContext } from '../context.js';
import { withOperation } from '../errors.js';
import { buildQuery, nativeDatasetQuery, toDatasetQuery } from '../query/QueryBuilder.js';
import { defineTool } from '../server/defineTool.js';
import { success } from '../server/response.js';
import { IdSchema, QueryClausesShape, toQueryInput } from './params.js';

/** Number of result rows, when the response has the usual `data.rows` shape. */
export function rowCount(result: unknown): number | undefined {
    const parsed = z.object({ data: z.object({ rows: z.array(z.unknown()) }) }).safeParse(result);
    return parsed.success ? parsed.data.data.rows.length : undefined;
}

export const queryTools = defineTool<ToolContext>('query', {
    description: 'Ad-hoc queries',
    actions: {
        run_native: action({
            description: 'Run a native SQL query against a database and return the result rows.',
            readOnly: true,
            params: z.object({
                database_id: IdSchema,
                query: z.string().min(1).describe('SQL text'),
                native_parameters: z.array(z.record(z.unknown())).optional()
                    .describe('Values for the query\'s template tags'),
            }),
            handler: async (ctx, args) => {
                ctx.logger.debug(`Query: ${args.query.slice(0, 100)}`);
                const dataset = nativeDatasetQuery(args.database_id, args.query);
                const body = args.native_parameters !== undefined && args.native_parameters.length > 0
                    ? { ...dataset, native: { ...dataset.native, parameters: args.native_parameters } }
                    : dataset;
                const result = await withOperation('execute_query', () => ctx.gateway.send('POST', '/dataset', body));
                ctx.logger.info(`Query on database ${args.database_id} returned ${rowCount(result) ?? 0} rows`);
                return success(result);
            },
        }),

        run_structured: action({
            description:
                'Run a structured (MBQL) query built from clause lists, without saving it. ' +
                'Field references look like ["field", <field id>, null]; get the ids from table_fields.',
            readOnly: true,
            params: z.object({
                database_id: IdSchema,
                source_table: z.union([IdSchema, z.string().regex(/^card__\d+$/)])
                    .describe('Table id, or "card__<id>" to query a saved question'),
                ...QueryClausesShape,
            }),
            handler: async (ctx, args) => {
                const query = buildQuery(toQueryInput(args.source_table, args));
                const result = await withOperation('execute_query', () => ctx.gateway.send('POST', '/dataset', toDatasetQuery(args.database_id, query)));
                ctx.logger.info(`Structured query on table ${args.source_table} returned ${rowCount(result) ?? 0} rows`);
                return success(result);
            },
        }),
    },
});
