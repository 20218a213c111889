import { describe, it, expect } from 'vitest';
import { CardSchema } from '../../src/domain/documents.js';
import { MetabaseError, TransportError } from '../../src/errors.js';
import { MetricDiscovery, summarizeMetric } from '../../src/metrics/MetricDiscovery.js';
import { FakeGateway } from '../fixtures/FakeGateway.js';

function metric(id: number, tableId: number, databaseId: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        id,
        name: `Metric ${id}`,
        type: 'metric',
        dataset_query: {
            database: databaseId,
            type: 'query',
            query: {
                'source-table': tableId,
                aggregation: [['aggregation-options', ['sum', ['field', 81, null]], { name: `Metric ${id}`, 'display-name': `Metric ${id}` }]],
            },
        },
        ...extra,
    };
}

const CARDS = [
    metric(1, 12, 1, { description: 'Total revenue', collection_id: 3, collection: { id: 3, name: 'Finance' } }),
    metric(2, 12, 2),
    metric(3, 13, 1),
    { ...metric(4, 12, 1), type: 'question' },
    { id: 5, name: 'Native', type: 'metric', dataset_query: { database: 1, type: 'native', native: { query: 'SELECT 1' } } },
    { name: 'no id' },
];

describe('MetricDiscovery', () => {
    it('finds the metrics on a table across databases', async () => {
        const discovery = new MetricDiscovery(new FakeGateway().serve('/card', CARDS));
        const found = await discovery.find(12);
        expect(found.map(m => m.id)).toEqual([1, 2]);
    });

    it('narrows to a database when given', async () => {
        const discovery = new MetricDiscovery(new FakeGateway().serve('/card', CARDS));
        expect((await discovery.find(12, 2)).map(m => m.id)).toEqual([2]);
    });

    it('returns an empty list when nothing matches', async () => {
        const discovery = new MetricDiscovery(new FakeGateway().serve('/card', CARDS));
        expect(await discovery.find(99)).toEqual([]);
    });

    it('accepts a list wrapped in data', async () => {
        const discovery = new MetricDiscovery(new FakeGateway().serve('/card', { data: CARDS }));
        expect((await discovery.find(13)).map(m => m.id)).toEqual([3]);
    });

    it('tags gateway failures with the operation', async () => {
        const failure = new TransportError('GET', '/card', new Error('socket hang up'));
        const discovery = new MetricDiscovery(new FakeGateway().fail('GET', '/card', failure));
        await expect(discovery.find(12)).rejects.toBe(failure);
        expect(failure.operation).toBe('find_metrics');
    });

    it('rejects a listing that is not a list', async () => {
        const discovery = new MetricDiscovery(new FakeGateway().serve('/card', 'nope'));
        await expect(discovery.find(12)).rejects.toBeInstanceOf(MetabaseError);
    });
});

describe('summarizeMetric', () => {
    it('normalizes the card', () => {
        expect(summarizeMetric(CardSchema.parse(CARDS[0]))).toEqual({
            id: 1,
            name: 'Metric 1',
            description: 'Total revenue',
            aggregation: 'aggregation-options',
            innerAggregation: 'sum',
            hasFilter: false,
            collectionId: 3,
            collectionName: 'Finance',
        });
    });

    it('reads a bare aggregation and a filter', () => {
        const card = CardSchema.parse({
            id: 6,
            name: 'Orders',
            type: 'metric',
            dataset_query: {
                database: 1,
                type: 'query',
                query: { 'source-table': 12, aggregation: [['count']], filter: ['=', ['field', 3, null], 'x'] },
            },
        });
        const summary = summarizeMetric(card);
        expect(summary.aggregation).toBe('count');
        expect(summary.innerAggregation).toBe('count');
        expect(summary.hasFilter).toBe(true);
        expect(summary.description).toBeNull();
        expect(summary.collectionName).toBeNull();
    });

    it("reports 'unknown' without an aggregation", () => {
        const summary = summarizeMetric(CardSchema.parse(CARDS[4]));
        expect(summary.aggregation).toBe('unknown');
        expect(summary.innerAggregation).toBe('unknown');
    });
});
