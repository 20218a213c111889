// ============================================================================
// Tool catalogue
// ============================================================================

import type { ToolContext } from '../context.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import type { ToolGroup } from '../server/defineTool.js';
import { ToolRegistry } from '../server/ToolRegistry.js';
import { cardTools } from './card.js';
import { collectionTools } from './collection.js';
import { dashboardTools } from './dashboard.js';
import { databaseTools, tableTools } from './database.js';
import { metricTools } from './metric.js';
import { queryTools } from './query.js';

/** Every tool group the server exposes, in listing order. */
export const allTools: readonly ToolGroup<ToolContext>[] = [
    databaseTools,
    tableTools,
    queryTools,
    cardTools,
    metricTools,
    dashboardTools,
    collectionTools,
];

export function createRegistry(debug?: DebugObserverFn): ToolRegistry<ToolContext> {
    const registry = new ToolRegistry<ToolContext>(debug !== undefined ? { debug } : {});
    registry.registerAll(...allTools);
    return registry;
}

export { cardTools, collectionTools, dashboardTools, databaseTools, metricTools, queryTools, tableTools };
