import { describe, it, expect } from 'vitest';
import type { Clause } from '../../src/domain/documents.js';
import {
    isNamedAggregation,
    renameAggregation,
    unwrapAggregation,
    wrapAggregation,
} from '../../src/query/MetricWrapper.js';

const sum: Clause = ['sum', ['field', 81, null]];

describe('wrapAggregation', () => {
    it('names the clause with name and display-name', () => {
        expect(wrapAggregation(sum, 'Revenue')).toEqual([
            'aggregation-options',
            ['sum', ['field', 81, null]],
            { name: 'Revenue', 'display-name': 'Revenue' },
        ]);
    });
});

describe('isNamedAggregation', () => {
    it('recognizes only well-formed wrappers', () => {
        expect(isNamedAggregation(wrapAggregation(sum, 'x'))).toBe(true);
        expect(isNamedAggregation(sum)).toBe(false);
        expect(isNamedAggregation(['aggregation-options', 'sum', {}])).toBe(false);
        expect(isNamedAggregation(['aggregation-options', sum, null])).toBe(false);
    });
});

describe('renameAggregation', () => {
    it('wraps a bare clause', () => {
        expect(renameAggregation(['count'], 'Orders')).toEqual([
            'aggregation-options',
            ['count'],
            { name: 'Orders', 'display-name': 'Orders' },
        ]);
    });

    it('renames a wrapped clause and keeps its other options', () => {
        const wrapped: Clause = ['aggregation-options', sum, { name: 'Old', 'display-name': 'Old', 'lib/uuid': 'abc' }];
        expect(renameAggregation(wrapped, 'New')).toEqual([
            'aggregation-options',
            sum,
            { name: 'New', 'display-name': 'New', 'lib/uuid': 'abc' },
        ]);
    });

    it('leaves the input untouched', () => {
        const options = { name: 'Old', 'display-name': 'Old' };
        const wrapped: Clause = ['aggregation-options', sum, options];
        renameAggregation(wrapped, 'New');
        expect(options).toEqual({ name: 'Old', 'display-name': 'Old' });
        expect(wrapped[2]).toBe(options);
    });

    it('never nests wrappers', () => {
        const twice = renameAggregation(renameAggregation(sum, 'A'), 'B');
        expect(twice).toEqual(['aggregation-options', sum, { name: 'B', 'display-name': 'B' }]);
    });
});

describe('unwrapAggregation', () => {
    it('returns the inner clause of a wrapper', () => {
        expect(unwrapAggregation(wrapAggregation(sum, 'x'))).toEqual(sum);
    });

    it('returns any other clause as is', () => {
        expect(unwrapAggregation(sum)).toBe(sum);
    });
});
