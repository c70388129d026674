/**
 * @snapdelta/daemon
 *
 * Config loading, dataset schedulers, supervisor, deliveries and the status
 * endpoint
 */

export { Logger, redactSecrets } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export { withTimeout, timeoutError } from './timeout.js';
export { DEFAULT_BACKOFF, backoffCeiling, computeBackoffDelay, sleep } from './backoff.js';
export type { BackoffPolicy } from './backoff.js';
export { parseDailyAt, nextDailyRun, delayUntilNextRun } from './schedule.js';
export type { Schedule } from './schedule.js';
export {
  configFileSchema,
  datasetEntrySchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, DatasetEntry, DeliveryConfig, SourceEntry, StoreConfig } from './config.js';
export { Metrics, metrics } from './metrics.js';
export { DatasetHealthRegistry } from './dataset-health.js';
export type { DatasetHealth } from './dataset-health.js';
export { DatasetRegistry } from './dataset-registry.js';
export { DatasetPipeline } from './pipeline.js';
export type { ProcessedSnapshot } from './pipeline.js';
export { DatasetScheduler } from './scheduler/dataset-scheduler.js';
export type {
  CycleOutcome,
  DatasetSchedulerOptions,
  SchedulerState,
} from './scheduler/dataset-scheduler.js';
export { Supervisor } from './supervisor.js';
export { LogDelivery } from './deliveries/log-delivery.js';
export { WebhookDelivery } from './deliveries/webhook-delivery.js';
export type { WebhookDeliveryConfig } from './deliveries/webhook-delivery.js';
export { handleStatusRequest, startStatusServer, closeStatusServer } from './http-server.js';
export { createRuntime, createStores, createFetcher, createDelivery, createScheduler } from './runtime.js';
export type { Runtime, Stores } from './runtime.js';
