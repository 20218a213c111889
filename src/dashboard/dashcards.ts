// ============================================================================
// Dashcard list edits — Pure helpers over a fetched dashboard
// ============================================================================

import type { Dashboard, Dashcard, ParameterMapping } from '../domain/documents.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { IdAllocator } from './IdAllocator.js';
import type { DashcardDraft, ParameterDraft } from './drafts.js';

export const DEFAULT_CARD_WIDTH = 12;
export const DEFAULT_CARD_HEIGHT = 6;

export interface CardPlacement {
    readonly cardId: number;
    /** Default: the dashboard's first tab, or none when it has no tabs */
    readonly tabId?: number;
    readonly row?: number;
    readonly col?: number;
    readonly sizeX?: number;
    readonly sizeY?: number;
    readonly visualizationSettings?: Record<string, unknown>;
    readonly parameterMappings?: readonly ParameterMapping[];
}

/**
 * New dashcard for `placement`, placed below every card already on its tab
 * unless a row is given. Its id is the next free negative id.
 */
export function draftDashcard(dashboard: Dashboard, placement: CardPlacement): DashcardDraft {
    const tabId = resolveTab(dashboard, placement.tabId);
    return {
        id: IdAllocator.below(dashboard.dashcards.map(dc => dc.id)).next(),
        card_id: placement.cardId,
        dashboard_tab_id: tabId,
        row: placement.row ?? nextFreeRow(dashboard.dashcards, tabId),
        col: placement.col ?? 0,
        size_x: placement.sizeX ?? DEFAULT_CARD_WIDTH,
        size_y: placement.sizeY ?? DEFAULT_CARD_HEIGHT,
        visualization_settings: placement.visualizationSettings ?? {},
        parameter_mappings: (placement.parameterMappings ?? []).map(m => ({ ...m, card_id: placement.cardId })),
    };
}

/** First row below every dashcard on `tabId`. */
export function nextFreeRow(dashcards: readonly Dashcard[], tabId: number | null): number {
    let row = 0;
    for (const dc of dashcards) {
        if ((dc.dashboard_tab_id ?? null) !== tabId) continue;
        row = Math.max(row, dc.row + dc.size_y);
    }
    return row;
}

/**
 * The list without dashcard `dashcardId`. The input list is left as is.
 *
 * @throws NotFoundError when no dashcard has that id
 */
export function withoutDashcard(dashcards: readonly Dashcard[], dashcardId: number): Dashcard[] {
    const kept = dashcards.filter(dc => dc.id !== dashcardId);
    if (kept.length === dashcards.length) {
        throw new NotFoundError('Dashcard', dashcardId, dashcards.map(dc => dc.id));
    }
    return kept;
}

/** @throws ValidationError when two parameters share an id */
export function assertUniqueParameterIds(parameters: readonly ParameterDraft[]): void {
    const duplicates = findDuplicates(parameters.map(p => p.id));
    if (duplicates.length > 0) {
        throw new ValidationError(`Duplicate parameter ids: ${duplicates.join(', ')}`, { field: 'parameters' });
    }
}

/**
 * Dashcard ids must be unique, and every mapping must name a parameter the
 * dashboard defines.
 */
export function assertDashcardsConsistent(
    dashcards: readonly DashcardDraft[],
    parameters: readonly ParameterDraft[],
): void {
    const duplicates = findDuplicates(dashcards.map(dc => dc.id));
    if (duplicates.length > 0) {
        throw new ValidationError(`Duplicate dashcard ids: ${duplicates.join(', ')}`, { field: 'dashcards' });
    }

    const known = new Set(parameters.map(p => p.id));
    const unknown = new Set<string>();
    for (const dc of dashcards) {
        for (const m of dc.parameter_mappings ?? []) {
            if (!known.has(m.parameter_id)) unknown.add(m.parameter_id);
        }
    }
    if (unknown.size > 0) {
        throw new ValidationError(
            `Parameter mappings reference undefined parameters: ${[...unknown].join(', ')}`,
            { field: 'dashcards' },
        );
    }
}

// ── Internal ──

function resolveTab(dashboard: Dashboard, tabId: number | undefined): number | null {
    if (tabId === undefined) return dashboard.tabs[0]?.id ?? null;
    if (!dashboard.tabs.some(t => t.id === tabId)) {
        throw new NotFoundError('Tab', tabId, dashboard.tabs.map(t => t.id));
    }
    return tabId;
}

function findDuplicates<T>(values: readonly T[]): T[] {
    const seen = new Set<T>();
    const duplicates = new Set<T>();
    for (const v of values) {
        if (seen.has(v)) duplicates.add(v);
        seen.add(v);
    }
    return [...duplicates];
}
