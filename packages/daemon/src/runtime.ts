/**
 * Wiring from a validated config file to running components
 */

import { join, resolve } from 'node:path';
import type {
  DatasetSchema,
  IEventDelivery,
  IHistoryStore,
  IMarkerStore,
  ISnapshotFetcher,
} from '@snapdelta/core';
import {
  FileHistoryStore,
  FileMarkerStore,
  MemoryHistoryStore,
  MemoryMarkerStore,
} from '@snapdelta/engine';
import { FileSnapshotFetcher, HttpSnapshotFetcher } from '@snapdelta/sources';
import type { FetchFn } from '@snapdelta/sources';
import { PostgresClient, PostgresHistoryStore, PostgresMarkerStore } from '@snapdelta/store-postgres';
import type { ConfigFile, DatasetEntry, DeliveryConfig, SourceEntry, StoreConfig } from './config.js';
import { DatasetHealthRegistry } from './dataset-health.js';
import { DatasetRegistry } from './dataset-registry.js';
import { LogDelivery } from './deliveries/log-delivery.js';
import { WebhookDelivery } from './deliveries/webhook-delivery.js';
import type { Logger } from './logger.js';
import { metrics as defaultMetrics } from './metrics.js';
import type { Metrics } from './metrics.js';
import { DatasetPipeline } from './pipeline.js';
import { DatasetScheduler } from './scheduler/dataset-scheduler.js';
import { Supervisor } from './supervisor.js';

export interface Stores {
  history: IHistoryStore;
  markers: IMarkerStore;
  close(): Promise<void>;
}

export async function createStores(config: StoreConfig, logger?: Logger): Promise<Stores> {
  switch (config.type) {
    case 'file': {
      const dir = resolve(process.cwd(), config.dir);
      const history = new FileHistoryStore(join(dir, 'history'));
      const markers = new FileMarkerStore(join(dir, 'markers'));
      return {
        history,
        markers,
        close: async () => {
          await history.close();
          await markers.close();
        },
      };
    }

    case 'memory': {
      const history = new MemoryHistoryStore();
      const markers = new MemoryMarkerStore();
      return {
        history,
        markers,
        close: async () => {
          await history.close();
          await markers.close();
        },
      };
    }

    case 'postgresql': {
      const client = new PostgresClient({
        connectionString: config.connectionString,
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl,
        onPoolError: (error) => {
          logger?.warn('PostgreSQL pool connection lost', { error });
        },
      });
      await client.connect();
      return {
        history: new PostgresHistoryStore(client, {
          schema: config.schema,
          tablePrefix: config.tablePrefix,
        }),
        markers: new PostgresMarkerStore(client, {
          schema: config.schema,
          table: config.markerTable,
        }),
        close: () => client.disconnect(),
      };
    }
  }
}

export function createFetcher(source: SourceEntry, fetchFn?: FetchFn): ISnapshotFetcher {
  switch (source.type) {
    case 'file':
      return new FileSnapshotFetcher({
        filePath: resolve(process.cwd(), source.filePath),
        format: source.format,
        encoding: source.encoding,
        csv: source.csv,
        excel: source.excel,
        json: source.json,
      });

    case 'http':
      return new HttpSnapshotFetcher(
        {
          url: source.url,
          format: source.format,
          marker: source.marker,
          headers: source.headers,
          timeoutMs: source.timeoutMs,
          encoding: source.encoding,
          csv: source.csv,
          excel: source.excel,
          json: source.json,
        },
        { fetch: fetchFn }
      );
  }
}

export function createDelivery(config: DeliveryConfig, logger: Logger): IEventDelivery {
  switch (config.type) {
    case 'log':
      return new LogDelivery(logger.child({ component: 'delivery' }));
    case 'webhook':
      return new WebhookDelivery({
        url: config.url,
        headers: config.headers,
        timeoutMs: config.timeoutMs,
      });
  }
}

export interface SchedulerDeps {
  stores: Stores;
  delivery: IEventDelivery;
  logger: Logger;
  metrics: Metrics;
  health: DatasetHealthRegistry;
  defaults?: ConfigFile['defaults'];
  fetcher?: ISnapshotFetcher;
}

export function createScheduler(entry: DatasetEntry, deps: SchedulerDeps): DatasetScheduler {
  const schema: DatasetSchema = entry.schema;
  return new DatasetScheduler({
    pipeline: new DatasetPipeline(schema, deps.stores.history, entry.notify),
    fetcher: deps.fetcher ?? createFetcher(entry.source),
    markers: deps.stores.markers,
    delivery: deps.delivery,
    schedule: entry.schedule,
    backoff: { ...deps.defaults?.backoff, ...entry.backoff },
    timeouts: { ...deps.defaults?.timeouts, ...entry.timeouts },
    logger: deps.logger,
    metrics: deps.metrics,
    health: deps.health,
  });
}

export interface Runtime {
  registry: DatasetRegistry;
  health: DatasetHealthRegistry;
  supervisor: Supervisor;
  stores: Stores;
  close(): Promise<void>;
}

export async function createRuntime(
  config: ConfigFile,
  logger: Logger,
  metrics: Metrics = defaultMetrics
): Promise<Runtime> {
  const stores = await createStores(config.store, logger);
  const delivery = createDelivery(config.delivery, logger);
  const health = new DatasetHealthRegistry();
  const registry = new DatasetRegistry();

  for (const entry of config.datasets) {
    registry.register(
      createScheduler(entry, {
        stores,
        delivery,
        logger,
        metrics,
        health,
        defaults: config.defaults,
      })
    );
    health.recordState(entry.id, 'idle', 0);
  }

  return {
    registry,
    health,
    supervisor: new Supervisor(registry, logger),
    stores,
    close: () => stores.close(),
  };
}
