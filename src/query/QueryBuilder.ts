/**
 * QueryBuilder — Structured Query Assembly
 *
 * Assembles an MBQL query document from independently supplied clause
 * lists. Only the keys whose input was supplied are emitted: an absent
 * input never becomes an empty list or a `null`.
 *
 * The builder is structural, not semantic. Clauses are passed through
 * uninterpreted and malformed ones fail remotely.
 *
 * @example
 * ```typescript
 * const query = buildQuery({
 *     sourceTable: 12,
 *     aggregations: [['sum', fieldRef(81)]],
 *     breakouts: [fieldRef(77, { 'temporal-unit': 'month' })],
 * });
 * // { 'source-table': 12, aggregation: [...], breakout: [...] }
 * ```
 *
 * @module
 */
import { ValidationError } from '../errors.js';
import type {
    Clause,
    FieldOptions,
    FieldRef,
    JoinSpec,
    MetricRef,
    NativeDatasetQuery,
    StructuredDatasetQuery,
    StructuredQuery,
} from '../domain/documents.js';

// ── Input ────────────────────────────────────────────────

export interface QueryInput {
    /** Table id, or `card__<id>` to query a saved question */
    readonly sourceTable: number | string;
    readonly aggregations?: readonly Clause[];
    readonly breakouts?: readonly Clause[];
    readonly filter?: Clause;
    readonly orderBy?: readonly Clause[];
    readonly expressions?: Readonly<Record<string, Clause>>;
    readonly joins?: readonly JoinSpec[];
    readonly limit?: number;
    readonly fields?: readonly Clause[];
}

// ── Builder ──────────────────────────────────────────────

/** Assemble a structured query. Pure: identical input gives an identical document. */
export function buildQuery(input: QueryInput): StructuredQuery {
    const query: StructuredQuery = { 'source-table': input.sourceTable };

    if (input.aggregations !== undefined) query.aggregation = [...input.aggregations];
    if (input.breakouts !== undefined) query.breakout = [...input.breakouts];
    if (input.filter !== undefined) query.filter = input.filter;
    if (input.orderBy !== undefined) query['order-by'] = [...input.orderBy];
    if (input.expressions !== undefined) query.expressions = { ...input.expressions };
    if (input.joins !== undefined) query.joins = [...input.joins];
    if (input.limit !== undefined) query.limit = input.limit;
    if (input.fields !== undefined) query.fields = [...input.fields];

    return query;
}

/** Wrap a structured query for `/dataset` or a card's `dataset_query`. */
export function toDatasetQuery(databaseId: number, query: StructuredQuery): StructuredDatasetQuery {
    return { database: databaseId, type: 'query', query };
}

export function nativeDatasetQuery(
    databaseId: number,
    sql: string,
    templateTags?: Record<string, unknown>,
): NativeDatasetQuery {
    return {
        database: databaseId,
        type: 'native',
        native: {
            query: sql,
            ...(templateTags !== undefined ? { 'template-tags': templateTags } : {}),
        },
    };
}

// ── Clause Helpers ───────────────────────────────────────

export function fieldRef(id: number | string, options?: FieldOptions): FieldRef {
    const opts = options !== undefined && Object.keys(options).length > 0 ? { ...options } : null;
    return ['field', id, opts];
}

/** Reference a saved metric. The id is mandatory. */
export function metricRef(id: number | undefined): MetricRef {
    if (id === undefined || !Number.isInteger(id) || id <= 0) {
        throw new ValidationError(
            `A metric reference needs a positive integer id, got ${String(id)}`,
            { field: 'metric_id' },
        );
    }
    return ['metric', id];
}

/**
 * Collapse several filter clauses into one.
 * None → `undefined`, one → itself, several → `['and', ...]`.
 */
export function combineFilters(clauses: readonly Clause[]): Clause | undefined {
    if (clauses.length === 0) return undefined;
    if (clauses.length === 1) return clauses[0];
    return ['and', ...clauses];
}
