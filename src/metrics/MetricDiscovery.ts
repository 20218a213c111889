// ============================================================================
// MetricDiscovery — Find the saved metrics defined on a table
// ============================================================================

import type { Gateway } from '../client/Gateway.js';
import { CardSchema, type Card, type Clause } from '../domain/documents.js';
import { withOperation } from '../errors.js';
import { listItems, parseItems } from '../format/lists.js';
import { unwrapAggregation } from '../query/MetricWrapper.js';

export interface MetricSummary {
    readonly id: number;
    readonly name: string;
    readonly description: string | null;
    /**
     * First element of the first aggregation clause, as stored: `aggregation-options`
     * for a named aggregation, otherwise its operator (`sum`, `count`, ...).
     * `'unknown'` when the query has no aggregation.
     */
    readonly aggregation: string;
    /** Operator inside a named aggregation; equal to `aggregation` for a bare one */
    readonly innerAggregation: string;
    readonly hasFilter: boolean;
    readonly collectionId: number | null;
    readonly collectionName: string | null;
}

/**
 * Scans every saved card and keeps the metrics whose stored query reads
 * from a given table (and, optionally, database).
 *
 * No match is an ordinary outcome: an empty list tells the caller there is
 * no standardized metric yet.
 */
export class MetricDiscovery {
    constructor(private readonly gateway: Gateway) {}

    async find(tableId: number, databaseId?: number): Promise<MetricSummary[]> {
        return withOperation('find_metrics', async () => {
            const cards = parseItems(CardSchema, listItems(await this.gateway.get('/card'), 'card list'));

            return cards
                .filter(card => card.type === 'metric')
                .filter(card => this.matches(card, tableId, databaseId))
                .map(card => summarizeMetric(card));
        });
    }

    // ── Internal ──

    private matches(card: Card, tableId: number, databaseId: number | undefined): boolean {
        const stored = card.dataset_query;
        if (stored === undefined) return false;
        if (stored.query?.['source-table'] !== tableId) return false;
        if (databaseId !== undefined && stored.database !== databaseId) return false;
        return true;
    }
}

/** Normalize a metric card into a {@link MetricSummary}. */
export function summarizeMetric(card: Card): MetricSummary {
    const query = card.dataset_query?.query;
    const clause = firstAggregation(query?.['aggregation']);
    return {
        id: card.id,
        name: card.name,
        description: card.description ?? null,
        aggregation: clause?.[0] ?? 'unknown',
        innerAggregation: clause !== undefined ? unwrapAggregation(clause)[0] : 'unknown',
        hasFilter: query?.['filter'] !== undefined && query['filter'] !== null,
        collectionId: card.collection_id ?? null,
        collectionName: card.collection?.name ?? null,
    };
}

function firstAggregation(aggregation: unknown): Clause | undefined {
    if (!Array.isArray(aggregation)) return undefined;
    const first: unknown = aggregation[0];
    if (!Array.isArray(first)) return undefined;
    const head: unknown = first[0];
    if (typeof head !== 'string') return undefined;
    return [head, ...first.slice(1)];
}
