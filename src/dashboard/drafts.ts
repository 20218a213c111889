// ============================================================================
// Drafts — Shapes written back with PUT /dashboard/:id
// ============================================================================

import type { ParameterMapping } from '../domain/documents.js';

export interface TabDraft {
    readonly id: number;
    readonly name: string;
}

/**
 * A dashcard as written back. Fetched dashcards satisfy it as they are;
 * new ones carry a negative id.
 */
export interface DashcardDraft {
    readonly id: number;
    readonly card_id: number | null;
    readonly dashboard_tab_id?: number | null;
    readonly row: number;
    readonly col: number;
    readonly size_x: number;
    readonly size_y: number;
    readonly visualization_settings?: Record<string, unknown> | null;
    readonly parameter_mappings?: readonly ParameterMapping[] | null;
}

export interface ParameterDraft {
    readonly id: string;
    readonly name: string;
    readonly slug: string;
    readonly type: string;
    readonly [key: string]: unknown;
}

/** Top-level fields of a dashboard write. Every list present replaces the remote list. */
export interface DashboardUpdate {
    readonly tabs?: readonly TabDraft[];
    readonly dashcards?: readonly DashcardDraft[];
    readonly parameters?: readonly ParameterDraft[];
    readonly name?: string;
    readonly description?: string | null;
    readonly collection_id?: number | null;
    readonly archived?: boolean;
}
