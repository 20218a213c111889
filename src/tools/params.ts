// ============================================================================
// Shared parameter schemas for query-building tools
// ============================================================================

import { z } from 'zod';
import { ClauseSchema } from '../domain/documents.js';
import { combineFilters, type QueryInput } from '../query/QueryBuilder.js';

export const IdSchema = z.number().int().positive();

export const JoinSpecSchema = z.object({
    'source-table': z.union([z.number().int(), z.string()]),
    condition: ClauseSchema,
    alias: z.string().optional(),
    fields: z.union([z.literal('all'), z.literal('none'), z.array(ClauseSchema)]).optional(),
    strategy: z.enum(['left-join', 'right-join', 'inner-join', 'full-join']).optional(),
});

/** Clause inputs of a structured query, without its source table. */
export const QueryClausesShape = {
    aggregations: z.array(ClauseSchema).optional()
        .describe('Aggregation clauses, e.g. [["count"]] or [["sum", ["field", 12, null]]]'),
    breakouts: z.array(ClauseSchema).optional()
        .describe('Grouping clauses, e.g. [["field", 7, {"temporal-unit": "month"}]]'),
    filters: z.array(ClauseSchema).optional()
        .describe('Filter clauses, combined with "and" when there are several'),
    order_by: z.array(ClauseSchema).optional()
        .describe('Ordering clauses, e.g. [["desc", ["aggregation", 0]]]'),
    expressions: z.record(ClauseSchema).optional()
        .describe('Named custom expressions'),
    joins: z.array(JoinSpecSchema).optional(),
    limit: z.number().int().positive().optional(),
    fields: z.array(ClauseSchema).optional()
        .describe('Columns to return when not aggregating'),
};

const QueryClauses = z.object(QueryClausesShape);
export type QueryClauses = z.output<typeof QueryClauses>;

/** Map tool arguments onto builder input. Absent arguments stay absent. */
export function toQueryInput(sourceTable: number | string, args: QueryClauses): QueryInput {
    const filter = args.filters !== undefined ? combineFilters(args.filters) : undefined;
    return {
        sourceTable,
        ...(args.aggregations !== undefined ? { aggregations: args.aggregations } : {}),
        ...(args.breakouts !== undefined ? { breakouts: args.breakouts } : {}),
        ...(filter !== undefined ? { filter } : {}),
        ...(args.order_by !== undefined ? { orderBy: args.order_by } : {}),
        ...(args.expressions !== undefined ? { expressions: args.expressions } : {}),
        ...(args.joins !== undefined ? { joins: args.joins } : {}),
        ...(args.limit !== undefined ? { limit: args.limit } : {}),
        ...(args.fields !== undefined ? { fields: args.fields } : {}),
    };
}
