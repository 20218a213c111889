// ============================================================================
// Documents — Typed views over Metabase's JSON resources
// ============================================================================
//
// Every schema is `.passthrough()`: the fields the core interprets are typed,
// everything else rides along untouched through a read-modify-write cycle.

import { z } from 'zod';
import { MetabaseError } from '../errors.js';

// ── Clauses ──────────────────────────────────────────────

/** A tagged operator expression: `[tag, ...operands]` */
export type Clause = [string, ...unknown[]];

export const ClauseSchema: z.ZodType<Clause> = z.tuple([z.string()]).rest(z.unknown());

export type TemporalUnit =
    | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'quarter' | 'year'
    | 'minute-of-hour' | 'hour-of-day' | 'day-of-week' | 'day-of-month'
    | 'day-of-year' | 'week-of-year' | 'month-of-year' | 'quarter-of-year';

export type Binning =
    | { readonly strategy: 'default' }
    | { readonly strategy: 'num-bins'; readonly 'num-bins': number }
    | { readonly strategy: 'bin-width'; readonly 'bin-width': number };

/** Options map of a field reference. All keys are optional and orthogonal. */
export interface FieldOptions {
    readonly 'temporal-unit'?: TemporalUnit;
    readonly binning?: Binning;
    readonly 'join-alias'?: string;
    readonly 'base-type'?: string;
}

export type FieldRef = ['field', number | string, FieldOptions | null];
export type MetricRef = ['metric', number];

export type JoinStrategy = 'left-join' | 'right-join' | 'inner-join' | 'full-join';

export interface JoinSpec {
    readonly 'source-table': number | string;
    readonly condition: Clause;
    readonly alias?: string;
    readonly fields?: 'all' | 'none' | Clause[];
    readonly strategy?: JoinStrategy;
}

/** Structured (MBQL) query body */
export interface StructuredQuery {
    'source-table': number | string;
    aggregation?: Clause[];
    breakout?: Clause[];
    filter?: Clause;
    'order-by'?: Clause[];
    expressions?: Record<string, Clause>;
    joins?: JoinSpec[];
    limit?: number;
    fields?: Clause[];
}

export interface StructuredDatasetQuery {
    database: number;
    type: 'query';
    query: StructuredQuery;
}

export interface NativeDatasetQuery {
    database: number;
    type: 'native';
    native: {
        query: string;
        'template-tags'?: Record<string, unknown>;
    };
}

export type DatasetQuery = StructuredDatasetQuery | NativeDatasetQuery;

// ── Dashboards ───────────────────────────────────────────

export const TabSchema = z.object({
    id: z.number().int(),
    name: z.string(),
}).passthrough();

export const ParameterMappingSchema = z.object({
    parameter_id: z.string(),
    card_id: z.number().int().nullable().optional(),
    target: z.unknown(),
}).passthrough();

export const DashcardSchema = z.object({
    id: z.number().int(),
    card_id: z.number().int().nullable(),
    dashboard_tab_id: z.number().int().nullable().optional(),
    row: z.number().int(),
    col: z.number().int(),
    size_x: z.number().int(),
    size_y: z.number().int(),
    visualization_settings: z.record(z.unknown()).nullable().optional(),
    parameter_mappings: z.array(ParameterMappingSchema).nullable().optional(),
}).passthrough();

export const ParameterSchema = z.object({
    id: z.string(),
    name: z.string(),
    slug: z.string(),
    type: z.string(),
}).passthrough();

export const DashboardSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    description: z.string().nullable().optional(),
    collection_id: z.number().int().nullable().optional(),
    tabs: z.array(TabSchema).nullable().optional().transform(v => v ?? []),
    dashcards: z.array(DashcardSchema).nullable().optional().transform(v => v ?? []),
    parameters: z.array(ParameterSchema).nullable().optional().transform(v => v ?? []),
}).passthrough();

export type Tab = z.infer<typeof TabSchema>;
export type ParameterMapping = z.infer<typeof ParameterMappingSchema>;
export type Dashcard = z.infer<typeof DashcardSchema>;
export type Parameter = z.infer<typeof ParameterSchema>;
export type Dashboard = z.infer<typeof DashboardSchema>;

// ── Cards ────────────────────────────────────────────────

export const StoredDatasetQuerySchema = z.object({
    database: z.number().int().nullable().optional(),
    type: z.string().optional(),
    query: z.record(z.unknown()).optional(),
    native: z.record(z.unknown()).optional(),
}).passthrough();

export const CardSchema = z.object({
    id: z.number().int(),
    name: z.string(),
    description: z.string().nullable().optional(),
    type: z.string().nullable().optional(),
    database_id: z.number().int().nullable().optional(),
    collection_id: z.number().int().nullable().optional(),
    collection: z.object({
        name: z.string().optional(),
    }).passthrough().nullable().optional(),
    archived: z.boolean().optional(),
    dataset_query: StoredDatasetQuerySchema.optional(),
}).passthrough();

export type StoredDatasetQuery = z.infer<typeof StoredDatasetQuerySchema>;
export type Card = z.infer<typeof CardSchema>;

// ── Parsing ──────────────────────────────────────────────

/**
 * Parse a document returned by the gateway.
 * A shape mismatch means Metabase answered with something we cannot compose on.
 */
export function parseDocument<T extends z.ZodTypeAny>(
    schema: T,
    value: unknown,
    what: string,
): z.output<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = result.error.issues
            .map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
            .join('; ');
        throw new MetabaseError('REMOTE_ERROR', `Unexpected ${what} document: ${issues}`);
    }
    return result.data;
}
