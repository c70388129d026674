export type { ISnapshotFetcher } from './fetcher.js';
export type { IHistoryStore, AppendResult } from './history-store.js';
export type { IMarkerStore } from './marker-store.js';
export type {
  IEventDelivery,
  OutboundEvent,
  OperatorAlert,
  AlertSeverity,
} from './delivery.js';
