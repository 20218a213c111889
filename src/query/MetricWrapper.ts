// ============================================================================
// MetricWrapper — Named aggregation clauses
// ============================================================================

import type { Clause } from '../domain/documents.js';

export const AGGREGATION_OPTIONS = 'aggregation-options';

export interface AggregationNames {
    readonly name: string;
    readonly 'display-name': string;
    readonly [key: string]: unknown;
}

/** `['aggregation-options', <inner clause>, { name, display-name }]` */
export type NamedAggregation = ['aggregation-options', Clause, AggregationNames];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isClause(value: unknown): value is Clause {
    return Array.isArray(value) && typeof value[0] === 'string';
}

export function isNamedAggregation(clause: Clause): clause is NamedAggregation {
    return clause[0] === AGGREGATION_OPTIONS
        && isClause(clause[1])
        && isRecord(clause[2]);
}

/** Name an aggregation. Both `name` and `display-name` are set to `name`. */
export function wrapAggregation(clause: Clause, name: string): NamedAggregation {
    return [AGGREGATION_OPTIONS, clause, { name, 'display-name': name }];
}

/**
 * Rename an aggregation.
 *
 * A wrapped clause gets a fresh options map (other option keys are kept)
 * around the same inner clause; a bare clause is wrapped. The input is
 * never modified.
 */
export function renameAggregation(clause: Clause, newName: string): NamedAggregation {
    if (!isNamedAggregation(clause)) return wrapAggregation(clause, newName);
    const [, inner, options] = clause;
    return [AGGREGATION_OPTIONS, inner, { ...options, name: newName, 'display-name': newName }];
}

/** Inner clause of a named aggregation; any other clause is returned as is. */
export function unwrapAggregation(clause: Clause): Clause {
    return isNamedAggregation(clause) ? clause[1] : clause;
}
