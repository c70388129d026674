/**
 * @snapdelta/engine
 *
 * Snapshot normalization, diffing, history and marker stores, notification
 * dispatch and history export
 */

// Normalizer
export { normalizeSnapshot } from './normalize/snapshot-normalizer.js';
export type { NormalizeResult, RowDrop } from './normalize/snapshot-normalizer.js';
export { coerceField, parseLocaleNumber } from './normalize/coerce.js';
export type { CoerceResult } from './normalize/coerce.js';

// Diff
export { diffSnapshot, activeBaseline } from './diff/diff-engine.js';
export type { DiffResult } from './diff/diff-engine.js';
export { ValueComparator } from './diff/value-comparator.js';

// Stores
export { FileHistoryStore } from './history/file-history-store.js';
export { MemoryHistoryStore } from './history/memory-history-store.js';
export { FileMarkerStore } from './markers/file-marker-store.js';
export { MemoryMarkerStore } from './markers/memory-marker-store.js';

// Notification
export { NotificationDispatcher } from './notify/notification-dispatcher.js';
export type { NotifyConfig } from './notify/notification-dispatcher.js';
export { TrackedKeyMatcher, TRACK_ALL } from './notify/tracked-keys.js';
export type { MatchMode } from './notify/tracked-keys.js';

// Formatting and export
export { formatDelta, formatEvent, formatDiffSummary } from './formatters/change-formatter.js';
export { exportHistoryCsv } from './export/history-export.js';
export type { ExportOptions } from './export/history-export.js';
