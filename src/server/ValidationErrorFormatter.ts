/**
 * Argument errors rendered for the calling agent
 *
 * One `<field>` line per zod issue: zod's message, a preview of what the
 * agent sent, what the tool expects, and a hint for the argument kinds this
 * server takes (Metabase ids, MBQL clauses).
 *
 *   <validation_error action="dashboard_copy_tab">
 *   <field name="tab_id">Required. Sent: (missing). Expected: number. Look the id up with dashboard_get.</field>
 *   <recovery>Nothing was sent to Metabase. Correct these fields and call dashboard_copy_tab again.</recovery>
 *   </validation_error>
 *
 * @module
 */
import type { ZodIssue } from 'zod';
import { escapeXml, escapeXmlAttr } from './response.js';

/** Tool that lists the valid values of each id argument. */
const ID_SOURCES: Readonly<Record<string, string>> = {
    database_id: 'database_list',
    table_id: 'database_tables',
    card_id: 'card_list',
    metric_id: 'metric_find',
    collection_id: 'collection_list',
    parent_id: 'collection_list',
    dashboard_id: 'dashboard_list',
    source_dashboard_id: 'dashboard_list',
    target_dashboard_id: 'dashboard_list',
    tab_id: 'dashboard_get',
    dashcard_id: 'dashboard_get',
};

const CLAUSE_ARGS = new Set(['aggregation', 'aggregations', 'breakouts', 'filters', 'order_by', 'expressions', 'fields']);

const PREVIEW_LENGTH = 60;

export function formatValidationError(
    issues: readonly ZodIssue[],
    toolName: string,
    args: Record<string, unknown>,
): string {
    const lines = [`<validation_error action="${escapeXmlAttr(toolName)}">`];

    for (const issue of issues) {
        const name = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        const text = [
            `${issue.message}.`,
            `Sent: ${preview(valueAt(args, issue.path))}.`,
            ...optional(expectation(issue), e => `Expected: ${e}.`),
            ...optional(hint(issue.path), h => h),
        ].join(' ');
        lines.push(`<field name="${escapeXmlAttr(name)}">${escapeXml(text)}</field>`);
    }

    lines.push(`<recovery>Nothing was sent to Metabase. Correct these fields and call ${escapeXml(toolName)} again.</recovery>`);
    lines.push('</validation_error>');
    return lines.join('\n');
}

// ── Issue Text ───────────────────────────────────────────

function expectation(issue: ZodIssue): string | undefined {
    switch (issue.code) {
        case 'invalid_type':
            return issue.expected;
        case 'too_small':
            if (issue.type === 'string') return `at least ${count(issue.minimum, 'character')}`;
            if (issue.type === 'array') return `at least ${count(issue.minimum, 'item')}`;
            return issue.inclusive ? `${issue.minimum} or more` : `more than ${issue.minimum}`;
        case 'too_big':
            if (issue.type === 'string') return `at most ${count(issue.maximum, 'character')}`;
            if (issue.type === 'array') return `at most ${count(issue.maximum, 'item')}`;
            return issue.inclusive ? `${issue.maximum} or less` : `less than ${issue.maximum}`;
        case 'invalid_enum_value':
            return `one of ${issue.options.map(String).join(' | ')}`;
        case 'invalid_literal':
            return JSON.stringify(issue.expected);
        case 'invalid_union':
            return 'one of the shapes in the tool\'s input schema';
        default:
            return undefined;
    }
}

function hint(path: readonly (string | number)[]): string | undefined {
    const last = path[path.length - 1];
    const source = typeof last === 'string' ? ID_SOURCES[last] : undefined;
    if (source !== undefined) return `Look the id up with ${source}.`;

    const first = path[0];
    if (typeof first === 'string' && CLAUSE_ARGS.has(first)) {
        return 'Clauses are arrays led by an operator, e.g. ["field", 12, null].';
    }
    return undefined;
}

function count(n: number | bigint, unit: string): string {
    return `${n} ${unit}${n === 1 || n === 1n ? '' : 's'}`;
}

function optional<T>(value: T | undefined, render: (v: T) => string): string[] {
    return value === undefined ? [] : [render(value)];
}

// ── Sent Values ──────────────────────────────────────────

function valueAt(args: Record<string, unknown>, path: readonly (string | number)[]): unknown {
    let current: unknown = args;
    for (const key of path) {
        if (typeof current !== 'object' || current === null) return undefined;
        current = Reflect.get(current, key);
    }
    return current;
}

function preview(value: unknown): string {
    if (value === undefined) return '(missing)';
    const text = JSON.stringify(value) ?? String(value);
    return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH - 3)}...` : text;
}
