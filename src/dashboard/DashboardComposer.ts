/**
 * DashboardComposer — Read-modify-write operations on dashboards
 *
 * Every operation fetches the current dashboard, derives the new lists and
 * issues exactly one `PUT /dashboard/:id` carrying only the top-level fields
 * it changed. Lists in that body replace the remote lists wholesale.
 *
 * Two operations racing on one dashboard lose an update; callers that
 * compose concurrently serialize per dashboard id.
 *
 * @module
 */
import type { Gateway } from '../client/Gateway.js';
import { DashboardSchema, parseDocument, type Dashboard } from '../domain/documents.js';
import { ValidationError, withOperation } from '../errors.js';
import type { DashboardUpdate, DashcardDraft, ParameterDraft } from './drafts.js';
import {
    assertDashcardsConsistent,
    assertUniqueParameterIds,
    draftDashcard,
    withoutDashcard,
    type CardPlacement,
} from './dashcards.js';
import { planTabCopy, type TabCopyOptions, type TabCopyPlan } from './TabCopy.js';

export interface DashboardDetails {
    readonly name?: string;
    readonly description?: string | null;
    readonly collectionId?: number | null;
    readonly archived?: boolean;
}

export interface CopyTabRequest extends TabCopyOptions {
    readonly sourceDashboardId: number;
    readonly targetDashboardId: number;
}

/** Outcome of a composition: the write that was issued and Metabase's answer. */
export interface Composition<T = undefined> {
    readonly dashboardId: number;
    readonly update: DashboardUpdate;
    readonly result: unknown;
    readonly detail: T;
}

export class DashboardComposer {
    constructor(private readonly gateway: Gateway) {}

    async getDashboard(dashboardId: number): Promise<Dashboard> {
        return withOperation('get_dashboard', () => this.fetch(dashboardId));
    }

    /** Append one dashcard. The same card may already be on the dashboard. */
    async addCard(dashboardId: number, placement: CardPlacement): Promise<Composition<DashcardDraft>> {
        return withOperation('add_card_to_dashboard', async () => {
            const dashboard = await this.fetch(dashboardId);
            const dashcard = draftDashcard(dashboard, placement);
            const update: DashboardUpdate = { dashcards: [...dashboard.dashcards, dashcard] };
            return this.write(dashboardId, update, dashcard);
        });
    }

    async removeCard(dashboardId: number, dashcardId: number): Promise<Composition> {
        return withOperation('remove_card_from_dashboard', async () => {
            const dashboard = await this.fetch(dashboardId);
            const update: DashboardUpdate = { dashcards: withoutDashcard(dashboard.dashcards, dashcardId) };
            return this.write(dashboardId, update, undefined);
        });
    }

    /**
     * Replace the whole parameter list. Merging with the current list is the
     * caller's job.
     */
    async replaceParameters(dashboardId: number, parameters: readonly ParameterDraft[]): Promise<Composition> {
        return withOperation('update_dashboard_parameters', async () => {
            assertUniqueParameterIds(parameters);
            await this.fetch(dashboardId);
            return this.write(dashboardId, { parameters: [...parameters] }, undefined);
        });
    }

    /** Replace the whole dashcard list. Card ids are not checked. */
    async replaceDashcards(dashboardId: number, dashcards: readonly DashcardDraft[]): Promise<Composition> {
        return withOperation('update_dashboard_cards', async () => {
            const dashboard = await this.fetch(dashboardId);
            assertDashcardsConsistent(dashcards, dashboard.parameters);
            return this.write(dashboardId, { dashcards: [...dashcards] }, undefined);
        });
    }

    async updateDetails(dashboardId: number, details: DashboardDetails): Promise<Composition> {
        return withOperation('update_dashboard', async () => {
            const update: DashboardUpdate = {
                ...(details.name !== undefined ? { name: details.name } : {}),
                ...(details.description !== undefined ? { description: details.description } : {}),
                ...(details.collectionId !== undefined ? { collection_id: details.collectionId } : {}),
                ...(details.archived !== undefined ? { archived: details.archived } : {}),
            };
            if (Object.keys(update).length === 0) {
                throw new ValidationError('Nothing to update: give at least one of name, description, collection_id, archived');
            }
            if (update.name !== undefined && update.name.trim().length === 0) {
                throw new ValidationError('A dashboard needs a non-empty name', { field: 'name' });
            }
            await this.fetch(dashboardId);
            return this.write(dashboardId, update, undefined);
        });
    }

    /**
     * Copy a tab, its dashcards and (optionally) the parameters they use onto
     * another dashboard, or the same one. Running it twice yields two tabs.
     */
    async copyTab(request: CopyTabRequest): Promise<Composition<TabCopyPlan>> {
        return withOperation('copy_dashboard_tab', async () => {
            const source = await this.fetch(request.sourceDashboardId);
            const target = request.targetDashboardId === request.sourceDashboardId
                ? source
                : await this.fetch(request.targetDashboardId);
            const plan = planTabCopy(source, target, request);
            return this.write(request.targetDashboardId, plan.update, plan);
        });
    }

    // ── Internal ──

    private async fetch(dashboardId: number): Promise<Dashboard> {
        const raw = await this.gateway.get(`/dashboard/${dashboardId}`);
        return parseDocument(DashboardSchema, raw, 'dashboard');
    }

    private async write<T>(dashboardId: number, update: DashboardUpdate, detail: T): Promise<Composition<T>> {
        const result = await this.gateway.send('PUT', `/dashboard/${dashboardId}`, update);
        return { dashboardId, update, result, detail };
    }
}
