export * from './types/notice';
export * from './utils/errors';
export { logger, Logger, type LogLevel } from './utils/logger';
export { loadEnvironmentConfig, type EnvironmentConfig } from './config/environment';
export { syncSourceCatalog, findEmptySources, loadCategories } from './config/catalog';
export { ALL_SOURCES, SourceRegistry, sourceRegistry } from './adapters';
export type { NoticeSource, CollectContext, CollectResult } from './adapters';
export * from './fetcher';
export * from './persistence';
export * from './notifications';
export { isRecent, windowFor } from './pipeline/recency';
export { buildSnapshot, diffNotices } from './pipeline/dedup';
export { runSource, type PipelineDependencies, type PipelineSettings } from './pipeline/run-source';
export { runAll, summarize, type RunAllResult, type RunSummary } from './pipeline/orchestrator';
export { BatchDispatcher, type DispatchReport } from './pipeline/batch-dispatcher';
export * from './handlers';
export { createRuntime, type Runtime } from './runtime';
