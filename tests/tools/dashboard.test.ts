import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import type { ToolResponse } from '../../src/server/response.js';
import { dashboardKeys } from '../../src/tools/dashboard.js';
import { createRegistry } from '../../src/tools/index.js';
import { reportDashboard, salesDashboard } from '../fixtures/dashboards.js';
import { FakeGateway, fakeContext } from '../fixtures/FakeGateway.js';

function metabase(): FakeGateway {
    return new FakeGateway()
        .serve('/dashboard/1', salesDashboard())
        .serve('/dashboard/2', reportDashboard());
}

function call(gateway: FakeGateway, tool: string, args: Record<string, unknown>): Promise<ToolResponse> {
    return createRegistry().routeCall(fakeContext(gateway), tool, args);
}

function json(response: ToolResponse): unknown {
    expect(response.isError).toBeUndefined();
    return JSON.parse(response.content[0]?.text ?? '');
}

describe('dashboard_get', () => {
    it('describes tabs, dashcards and parameters', async () => {
        expect(json(await call(metabase(), 'dashboard_get', { dashboard_id: 2 }))).toEqual({
            id: 2,
            name: 'Report',
            description: null,
            collection_id: null,
            tabs: [{ id: 20, name: 'Main' }],
            dashcards: [{ id: 200, card_id: 4, dashboard_tab_id: 20, row: 0, col: 0, size_x: 12, size_y: 6 }],
            parameters: [{ id: 'p1', name: 'Region', slug: 'region', type: 'string/=' }],
        });
    });
});

describe('dashboard_get then set_parameters / set_cards', () => {
    const configured = salesDashboard();
    const Layout = z.object({
        parameters: z.array(z.record(z.unknown())),
        dashcards: z.array(z.record(z.unknown())),
    });

    function withFilterConfig(): FakeGateway {
        const dashboard = salesDashboard();
        const parameters = z.array(z.record(z.unknown())).parse(dashboard['parameters']);
        const dashcards = z.array(z.record(z.unknown())).parse(dashboard['dashcards']);
        return new FakeGateway().serve('/dashboard/1', {
            ...dashboard,
            parameters: parameters.map(p => p['id'] === 'p1'
                ? { ...p, default: ['Gizmo'], values_source_type: 'static-list', values_source_config: { values: ['Gizmo', 'Widget'] } }
                : p),
            dashcards: dashcards.map(dc => ({ ...dc, card: { id: dc['card_id'], name: 'Embedded card' } })),
        });
    }

    it('writes back every parameter and dashcard setting it read', async () => {
        const gateway = withFilterConfig();
        const layout = Layout.parse(json(await call(gateway, 'dashboard_get', { dashboard_id: 1 })));

        expect(layout.dashcards.some(dc => 'card' in dc)).toBe(false);

        await call(gateway, 'dashboard_set_parameters', { dashboard_id: 1, parameters: layout.parameters });
        await call(gateway, 'dashboard_set_cards', { dashboard_id: 1, dashcards: layout.dashcards });

        const [parametersWrite, cardsWrite] = gateway.writes;
        expect(parametersWrite?.body).toEqual({
            parameters: [
                {
                    id: 'p1',
                    name: 'Category',
                    slug: 'category',
                    type: 'string/=',
                    default: ['Gizmo'],
                    values_source_type: 'static-list',
                    values_source_config: { values: ['Gizmo', 'Widget'] },
                },
                { id: 'p2', name: 'Date', slug: 'date', type: 'date/all-options' },
            ],
        });
        expect(cardsWrite?.body).toEqual({ dashcards: configured['dashcards'] });
    });
});

describe('dashboard_add_card', () => {
    it('places the card below the first tab\'s cards with a negative id', async () => {
        const gateway = metabase();
        expect(json(await call(gateway, 'dashboard_add_card', { dashboard_id: 1, card_id: 12 }))).toEqual({
            dashboard_id: 1,
            dashcard: { id: -1, card_id: 12, dashboard_tab_id: 10, row: 10, col: 0, size_x: 12, size_y: 6 },
        });

        expect(gateway.writes).toHaveLength(1);
        expect(gateway.writes[0]?.path).toBe('/dashboard/1');
    });

    it('rejects a tab the dashboard does not have', async () => {
        const gateway = metabase();
        const response = await call(gateway, 'dashboard_add_card', { dashboard_id: 1, card_id: 12, tab_id: 99 });
        expect(response.isError).toBe(true);
        expect(response.content[0]?.text).toContain('<message>add_card_to_dashboard: Tab 99 not found (available: 10, 11)</message>');
        expect(gateway.writes).toEqual([]);
    });
});

describe('dashboard_remove_card', () => {
    it('writes the list without the dashcard', async () => {
        const gateway = metabase();
        expect(json(await call(gateway, 'dashboard_remove_card', { dashboard_id: 1, dashcard_id: 101 }))).toEqual({
            dashboard_id: 1,
            removed_dashcard_id: 101,
            remaining_dashcards: 2,
        });
    });

    it('lists the dashcard ids when the id is unknown', async () => {
        const response = await call(metabase(), 'dashboard_remove_card', { dashboard_id: 1, dashcard_id: 999 });
        expect(response.content[0]?.text)
            .toContain('<message>remove_card_from_dashboard: Dashcard 999 not found (available: 100, 101, 102)</message>');
    });
});

describe('dashboard_set_parameters', () => {
    it('replaces the parameter list', async () => {
        const gateway = metabase();
        const parameters = [{ id: 'p9', name: 'Status', slug: 'status', type: 'string/=' }];
        expect(json(await call(gateway, 'dashboard_set_parameters', { dashboard_id: 2, parameters }))).toEqual({
            dashboard_id: 2,
            parameters: ['p9'],
        });
        expect(gateway.writes).toEqual([{ method: 'PUT', path: '/dashboard/2', body: { parameters } }]);
    });

    it('refuses duplicate ids before contacting Metabase', async () => {
        const gateway = metabase();
        const parameters = [
            { id: 'p1', name: 'A', slug: 'a', type: 'string/=' },
            { id: 'p1', name: 'B', slug: 'b', type: 'string/=' },
        ];
        const response = await call(gateway, 'dashboard_set_parameters', { dashboard_id: 2, parameters });
        expect(response.content[0]?.text).toContain('<message>update_dashboard_parameters: Duplicate parameter ids: p1</message>');
        expect(gateway.calls).toEqual([]);
    });
});

describe('dashboard_set_cards', () => {
    it('rejects mappings to parameters the dashboard lacks', async () => {
        const gateway = metabase();
        const dashcards = [{
            id: 200, card_id: 4, dashboard_tab_id: 20, row: 0, col: 0, size_x: 12, size_y: 6,
            parameter_mappings: [{ parameter_id: 'missing', card_id: 4, target: ['dimension', ['field', 1, null]] }],
        }];
        const response = await call(gateway, 'dashboard_set_cards', { dashboard_id: 2, dashcards });
        expect(response.content[0]?.text)
            .toContain('<message>update_dashboard_cards: Parameter mappings reference undefined parameters: missing</message>');
        expect(gateway.writes).toEqual([]);
    });

    it('writes a consistent list', async () => {
        const gateway = metabase();
        const dashcards = [{ id: 200, card_id: 4, dashboard_tab_id: 20, row: 2, col: 6, size_x: 6, size_y: 4 }];
        expect(json(await call(gateway, 'dashboard_set_cards', { dashboard_id: 2, dashcards }))).toEqual({
            dashboard_id: 2,
            dashcards: 1,
        });
        expect(gateway.writes[0]?.body).toEqual({ dashcards });
    });
});

describe('dashboard_update', () => {
    it('sends only the given fields', async () => {
        const gateway = metabase();
        expect(json(await call(gateway, 'dashboard_update', { dashboard_id: 1, name: 'Sales 2026' }))).toEqual({
            dashboard_id: 1,
            updated: ['name'],
        });
        expect(gateway.writes[0]?.body).toEqual({ name: 'Sales 2026' });
    });

    it('needs at least one field', async () => {
        const response = await call(metabase(), 'dashboard_update', { dashboard_id: 1 });
        expect(response.isError).toBe(true);
        expect(response.content[0]?.text).toContain(
            '<message>update_dashboard: Nothing to update: give at least one of name, description, collection_id, archived</message>',
        );
    });
});

describe('dashboard_copy_tab', () => {
    it('copies the tab, its cards and the filters they use', async () => {
        const gateway = metabase();
        const response = await call(gateway, 'dashboard_copy_tab', {
            source_dashboard_id: 1,
            target_dashboard_id: 2,
            tab_id: 10,
        });

        expect(json(response)).toEqual({
            target_dashboard_id: 2,
            tab: { id: -1, name: 'Overview' },
            dashcards: [
                { id: -1, card_id: 7, dashboard_tab_id: -1, row: 0, col: 0, size_x: 12, size_y: 6 },
                { id: -2, card_id: 8, dashboard_tab_id: -1, row: 6, col: 0, size_x: 6, size_y: 4 },
            ],
            parameters_added: ['p1_copy'],
            renamed_parameters: { p1: 'p1_copy' },
        });

        expect(gateway.writes).toHaveLength(1);
        const write = gateway.writes[0];
        expect(write?.path).toBe('/dashboard/2');
        expect(write?.body).toMatchObject({
            tabs: [{ id: 20, name: 'Main' }, { id: -1, name: 'Overview' }],
            parameters: [
                { id: 'p1', name: 'Region', slug: 'region', type: 'string/=' },
                { id: 'p1_copy', name: 'Category', slug: 'category', type: 'string/=' },
            ],
        });
    });

    it('leaves the filters behind when asked to', async () => {
        const gateway = metabase();
        const body = json(await call(gateway, 'dashboard_copy_tab', {
            source_dashboard_id: 1,
            target_dashboard_id: 2,
            tab_id: 11,
            include_filters: false,
            tab_name: 'Copied details',
        }));

        expect(body).toMatchObject({
            tab: { id: -1, name: 'Copied details' },
            parameters_added: [],
            renamed_parameters: {},
        });
        expect(gateway.writes[0]?.body).not.toHaveProperty('parameters');
    });

    it('lists the source tabs when the tab is missing', async () => {
        const gateway = metabase();
        const response = await call(gateway, 'dashboard_copy_tab', {
            source_dashboard_id: 1,
            target_dashboard_id: 2,
            tab_id: 99,
        });
        expect(response.isError).toBe(true);
        expect(response.content[0]?.text).toContain('<message>copy_dashboard_tab: Tab 99 not found (available: 10, 11)</message>');
        expect(gateway.writes).toEqual([]);
    });
});

describe('dashboardKeys', () => {
    it('names the dashboards a call writes to', () => {
        expect(dashboardKeys({ source_dashboard_id: 1, target_dashboard_id: 2, tab_id: 10 })).toEqual(['dashboard:2']);
        expect(dashboardKeys({ dashboard_id: 4 })).toEqual(['dashboard:4']);
        expect(dashboardKeys({ name: 'New' })).toEqual([]);
    });
});
