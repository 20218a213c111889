/**
 * MetricDefinition — Payloads for creating and renaming metric cards
 *
 * A metric is a saved card of `type: 'metric'` whose structured query holds
 * exactly one aggregation, named after the metric itself. Renaming has to
 * touch both the card name and the aggregation's `name`/`display-name`,
 * otherwise Metabase keeps showing the old label on the aggregated column.
 *
 * @module
 */
import type { Card, Clause, StructuredDatasetQuery } from '../domain/documents.js';
import { ValidationError } from '../errors.js';
import { buildQuery, toDatasetQuery } from '../query/QueryBuilder.js';
import { renameAggregation, wrapAggregation } from '../query/MetricWrapper.js';

export interface MetricDefinitionInput {
    readonly name: string;
    readonly databaseId: number;
    readonly tableId: number;
    readonly aggregation: Clause;
    readonly filter?: Clause;
    readonly breakouts?: readonly Clause[];
    readonly description?: string;
    readonly collectionId?: number;
}

export interface MetricCardPayload {
    readonly name: string;
    readonly type: 'metric';
    readonly display: 'scalar';
    readonly database_id: number;
    readonly table_id: number;
    readonly dataset_query: StructuredDatasetQuery;
    readonly visualization_settings: Record<string, unknown>;
    readonly description?: string;
    readonly collection_id?: number;
}

export interface MetricRenamePayload {
    readonly name: string;
    readonly dataset_query: Record<string, unknown>;
}

/** Build the `POST /card` body for a new metric. */
export function buildMetricCard(input: MetricDefinitionInput): MetricCardPayload {
    if (input.name.trim().length === 0) {
        throw new ValidationError('A metric needs a non-empty name', { field: 'name' });
    }

    const query = buildQuery({
        sourceTable: input.tableId,
        aggregations: [wrapAggregation(input.aggregation, input.name)],
        ...(input.filter !== undefined ? { filter: input.filter } : {}),
        ...(input.breakouts !== undefined ? { breakouts: input.breakouts } : {}),
    });

    return {
        name: input.name,
        type: 'metric',
        display: 'scalar',
        database_id: input.databaseId,
        table_id: input.tableId,
        dataset_query: toDatasetQuery(input.databaseId, query),
        visualization_settings: {},
        ...(input.description !== undefined ? { description: input.description } : {}),
        ...(input.collectionId !== undefined ? { collection_id: input.collectionId } : {}),
    };
}

/**
 * Build the `PUT /card/:id` body renaming a metric.
 *
 * The stored dataset query is copied, never modified: only the first
 * aggregation is replaced by its renamed counterpart.
 */
export function renameMetricCard(card: Card, newName: string): MetricRenamePayload {
    if (newName.trim().length === 0) {
        throw new ValidationError('A metric needs a non-empty name', { field: 'name' });
    }

    const stored = card.dataset_query;
    const query = stored?.query;
    if (stored === undefined || query === undefined) {
        throw new ValidationError(`Card ${card.id} has no structured query to rename`, { field: 'metric_id' });
    }

    const aggregation = query['aggregation'];
    const first: unknown = Array.isArray(aggregation) ? aggregation[0] : undefined;
    const head: unknown = Array.isArray(first) ? first[0] : undefined;
    if (!Array.isArray(aggregation) || !Array.isArray(first) || typeof head !== 'string') {
        throw new ValidationError(`Card ${card.id} has no aggregation to rename`, { field: 'metric_id' });
    }

    const clause: Clause = [head, ...first.slice(1)];
    const renamed = [renameAggregation(clause, newName), ...aggregation.slice(1)];

    return {
        name: newName,
        dataset_query: { ...stored, query: { ...query, aggregation: renamed } },
    };
}
