/**
 * TabCopy — Plan the copy of one tab between dashboards
 *
 * Pure: takes the two fetched dashboards and returns the lists to write
 * back on the target. The target only ever grows; nothing already on it is
 * removed or modified.
 *
 * @module
 */
import type { Dashboard, Dashcard, ParameterMapping } from '../domain/documents.js';
import { NotFoundError } from '../errors.js';
import { IdAllocator } from './IdAllocator.js';
import type { DashboardUpdate, DashcardDraft, ParameterDraft, TabDraft } from './drafts.js';

export interface TabCopyOptions {
    readonly tabId: number;
    readonly includeFilters: boolean;
    /** Name of the new tab (default: the source tab's name) */
    readonly tabName?: string;
}

export interface TabCopyPlan {
    readonly tab: TabDraft;
    readonly dashcards: readonly DashcardDraft[];
    /** Parameters added to the target, possibly under a new id */
    readonly parameters: readonly ParameterDraft[];
    /** Source parameter id → id on the target, for every copied parameter */
    readonly renamed: ReadonlyMap<string, string>;
    /** The write that applies this plan */
    readonly update: DashboardUpdate;
}

export function planTabCopy(source: Dashboard, target: Dashboard, options: TabCopyOptions): TabCopyPlan {
    const tab = source.tabs.find(t => t.id === options.tabId);
    if (tab === undefined) {
        throw new NotFoundError('Tab', options.tabId, source.tabs.map(t => t.id));
    }

    const selected = source.dashcards.filter(dc => dc.dashboard_tab_id === tab.id);
    const newTab: TabDraft = {
        id: IdAllocator.below(target.tabs.map(t => t.id)).next(),
        name: options.tabName ?? tab.name,
    };

    const renamed = new Map<string, string>();
    const copiedParameters: ParameterDraft[] = [];
    if (options.includeFilters) {
        const referenced = referencedParameterIds(selected);
        const taken = new Set(target.parameters.map(p => p.id));
        for (const parameter of source.parameters) {
            if (!referenced.has(parameter.id)) continue;
            const id = freeParameterId(parameter.id, taken);
            taken.add(id);
            renamed.set(parameter.id, id);
            copiedParameters.push(id === parameter.id ? parameter : { ...parameter, id });
        }
    }

    const ids = IdAllocator.below(target.dashcards.map(dc => dc.id));
    const copiedDashcards = selected.map(dc => copyDashcard(dc, ids.next(), newTab.id, renamed));

    return {
        tab: newTab,
        dashcards: copiedDashcards,
        parameters: copiedParameters,
        renamed,
        update: {
            tabs: [...target.tabs, newTab],
            dashcards: [...target.dashcards, ...copiedDashcards],
            ...(copiedParameters.length > 0
                ? { parameters: [...target.parameters, ...copiedParameters] }
                : {}),
        },
    };
}

/** First of `id`, `id_copy`, `id_copy_1`, `id_copy_2`, ... not in `taken`. */
export function freeParameterId(id: string, taken: ReadonlySet<string>): string {
    if (!taken.has(id)) return id;
    let candidate = `${id}_copy`;
    for (let n = 1; taken.has(candidate); n++) {
        candidate = `${id}_copy_${n}`;
    }
    return candidate;
}

export function referencedParameterIds(dashcards: readonly Dashcard[]): Set<string> {
    const ids = new Set<string>();
    for (const dc of dashcards) {
        for (const mapping of dc.parameter_mappings ?? []) ids.add(mapping.parameter_id);
    }
    return ids;
}

function copyDashcard(
    source: Dashcard,
    id: number,
    tabId: number,
    renamed: ReadonlyMap<string, string>,
): DashcardDraft {
    const mappings: ParameterMapping[] = (source.parameter_mappings ?? []).map(m => ({
        ...m,
        parameter_id: renamed.get(m.parameter_id) ?? m.parameter_id,
        card_id: source.card_id,
    }));
    return {
        id,
        card_id: source.card_id,
        dashboard_tab_id: tabId,
        row: source.row,
        col: source.col,
        size_x: source.size_x,
        size_y: source.size_y,
        visualization_settings: source.visualization_settings ?? {},
        parameter_mappings: mappings,
    };
}
