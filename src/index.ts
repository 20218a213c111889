/**
 * @module
 * @description
 * Metabase MCP server: query building, metrics and dashboard composition
 * over the Metabase REST API, exposed as MCP tools.
 */
// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    MetabaseError, ValidationError, NotFoundError, GatewayError, TransportError, withOperation,
} from './errors.js';
/** @category Errors */
export type { MetabaseErrorCode } from './errors.js';

// ── Documents ────────────────────────────────────────────
/** @category Documents */
export {
    ClauseSchema, TabSchema, DashcardSchema, ParameterSchema, ParameterMappingSchema,
    DashboardSchema, CardSchema, parseDocument,
} from './domain/documents.js';
/** @category Documents */
export type {
    Clause, FieldRef, MetricRef, JoinSpec, StructuredQuery, DatasetQuery,
    Tab, Dashcard, Parameter, ParameterMapping, Dashboard, Card,
} from './domain/documents.js';

// ── Query ────────────────────────────────────────────────
/** @category Query */
export {
    buildQuery, toDatasetQuery, nativeDatasetQuery, fieldRef, metricRef, combineFilters,
} from './query/QueryBuilder.js';
/** @category Query */
export type { QueryInput } from './query/QueryBuilder.js';
/** @category Query */
export {
    AGGREGATION_OPTIONS, isNamedAggregation, wrapAggregation, renameAggregation, unwrapAggregation,
} from './query/MetricWrapper.js';

// ── Metrics ──────────────────────────────────────────────
/** @category Metrics */
export { buildMetricCard, renameMetricCard } from './metrics/MetricDefinition.js';
/** @category Metrics */
export { MetricDiscovery, summarizeMetric } from './metrics/MetricDiscovery.js';
/** @category Metrics */
export type { MetricSummary } from './metrics/MetricDiscovery.js';

// ── Dashboards ───────────────────────────────────────────
/** @category Dashboards */
export { DashboardComposer } from './dashboard/DashboardComposer.js';
/** @category Dashboards */
export type { Composition, CopyTabRequest, DashboardDetails } from './dashboard/DashboardComposer.js';
/** @category Dashboards */
export { planTabCopy, freeParameterId } from './dashboard/TabCopy.js';
/** @category Dashboards */
export type { TabCopyOptions, TabCopyPlan } from './dashboard/TabCopy.js';
/** @category Dashboards */
export { IdAllocator } from './dashboard/IdAllocator.js';
/** @category Dashboards */
export { draftDashcard, nextFreeRow } from './dashboard/dashcards.js';
/** @category Dashboards */
export type { CardPlacement } from './dashboard/dashcards.js';
/** @category Dashboards */
export type { DashboardUpdate, DashcardDraft, TabDraft, ParameterDraft } from './dashboard/drafts.js';

// ── Client ───────────────────────────────────────────────
/** @category Client */
export { MetabaseClient } from './client/MetabaseClient.js';
/** @category Client */
export type { MetabaseAuth, MetabaseClientConfig } from './client/MetabaseClient.js';
/** @category Client */
export type { Gateway, GatewayMethod, GatewayEvent, GatewayObserver } from './client/Gateway.js';

// ── Server ───────────────────────────────────────────────
/** @category Server */
export { ToolRegistry } from './server/ToolRegistry.js';
/** @category Server */
export { defineTool, actionFor } from './server/defineTool.js';
/** @category Server */
export type { ActionDef, ToolAction, ToolGroup, ToolGroupConfig } from './server/defineTool.js';
/** @category Server */
export { wrapChain, serializeBy } from './server/middleware.js';
/** @category Server */
export type { MiddlewareFn } from './server/middleware.js';
/** @category Server */
export { success, error, toonSuccess, toolError } from './server/response.js';
/** @category Server */
export type { ToolResponse, ErrorCode } from './server/response.js';
/** @category Server */
export { startServer } from './server/startServer.js';
/** @category Server */
export type { StartServerOptions, RunningServer } from './server/startServer.js';

// ── Tools ────────────────────────────────────────────────
/** @category Tools */
export { allTools, createRegistry } from './tools/index.js';
/** @category Tools */
export { createToolContext } from './context.js';
/** @category Tools */
export type { ToolContext } from './context.js';

// ── Config & Observability ───────────────────────────────
/** @category Config */
export { loadConfig } from './config/ConfigLoader.js';
/** @category Config */
export { ConfigError, ServerConfigSchema } from './config/ServerConfig.js';
/** @category Config */
export type { ServerConfig } from './config/ServerConfig.js';
/** @category Observability */
export { createLogger } from './observability/Logger.js';
/** @category Observability */
export type { Logger, LogLevel } from './observability/Logger.js';
/** @category Observability */
export { createDebugObserver } from './observability/DebugObserver.js';
/** @category Observability */
export type { DebugEvent, DebugObserverFn } from './observability/DebugObserver.js';
