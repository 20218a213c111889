// ============================================================================
// Dashboard documents shared by the composition tests
// ============================================================================

/** Two tabs; tab 10 holds two cards filtered by `p1`, tab 11 one card. */
export function salesDashboard(): Record<string, unknown> {
    return {
        id: 1,
        name: 'Sales',
        description: null,
        collection_id: 5,
        tabs: [
            { id: 10, name: 'Overview', position: 0 },
            { id: 11, name: 'Details', position: 1 },
        ],
        dashcards: [
            {
                id: 100,
                card_id: 7,
                dashboard_tab_id: 10,
                row: 0,
                col: 0,
                size_x: 12,
                size_y: 6,
                visualization_settings: { 'graph.dimensions': ['CREATED_AT'] },
                parameter_mappings: [
                    { parameter_id: 'p1', card_id: 7, target: ['dimension', ['field', 3, null]] },
                ],
                series: [],
            },
            {
                id: 101,
                card_id: 8,
                dashboard_tab_id: 10,
                row: 6,
                col: 0,
                size_x: 6,
                size_y: 4,
                visualization_settings: null,
                parameter_mappings: [
                    { parameter_id: 'p1', card_id: 8, target: ['dimension', ['field', 4, null]] },
                ],
            },
            {
                id: 102,
                card_id: 9,
                dashboard_tab_id: 11,
                row: 0,
                col: 0,
                size_x: 24,
                size_y: 8,
                parameter_mappings: [
                    { parameter_id: 'p2', card_id: 9, target: ['dimension', ['field', 5, null]] },
                ],
            },
        ],
        parameters: [
            { id: 'p1', name: 'Category', slug: 'category', type: 'string/=' },
            { id: 'p2', name: 'Date', slug: 'date', type: 'date/all-options' },
        ],
    };
}

/** Target of tab copies: one tab, one card, and already a parameter `p1`. */
export function reportDashboard(): Record<string, unknown> {
    return {
        id: 2,
        name: 'Report',
        tabs: [{ id: 20, name: 'Main' }],
        dashcards: [
            { id: 200, card_id: 4, dashboard_tab_id: 20, row: 0, col: 0, size_x: 12, size_y: 6 },
        ],
        parameters: [
            { id: 'p1', name: 'Region', slug: 'region', type: 'string/=' },
        ],
    };
}

export function emptyDashboard(id = 3): Record<string, unknown> {
    return { id, name: 'Empty', tabs: [], dashcards: [], parameters: [] };
}
