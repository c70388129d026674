/**
 * @snapdelta/store-postgres
 *
 * PostgreSQL-backed history and marker stores
 */

export { PostgresClient, validateIdentifier, toStoreError } from './client.js';
export type { PostgresClientConfig, PostgresQueryResult, TransactionQuery } from './client.js';
export { PostgresHistoryStore } from './history-store.js';
export type { PostgresHistoryStoreOptions } from './history-store.js';
export { PostgresMarkerStore } from './marker-store.js';
export type { PostgresMarkerStoreOptions } from './marker-store.js';
