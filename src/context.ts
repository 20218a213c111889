// ============================================================================
// ToolContext — What every tool handler receives
// ============================================================================

import type { Gateway } from './client/Gateway.js';
import { DashboardComposer } from './dashboard/DashboardComposer.js';
import { MetricDiscovery } from './metrics/MetricDiscovery.js';
import type { Logger } from './observability/Logger.js';
import { actionFor } from './server/defineTool.js';

export interface ToolContext {
    readonly gateway: Gateway;
    readonly dashboards: DashboardComposer;
    readonly metrics: MetricDiscovery;
    readonly logger: Logger;
}

export function createToolContext(gateway: Gateway, logger: Logger): ToolContext {
    return {
        gateway,
        dashboards: new DashboardComposer(gateway),
        metrics: new MetricDiscovery(gateway),
        logger,
    };
}

/** Action factory for this server's tools. */
export const action = actionFor<ToolContext>();
