/**
 * Snapshot Fetcher Interface
 *
 * Site-specific retrieval lives behind this interface. The scheduler only
 * needs a cheap marker check and a full snapshot fetch.
 */

import type { Marker, RawRow } from '../types/index.js';

export interface ISnapshotFetcher {
  /** Short description used in logs (e.g. the source URL) */
  readonly description: string;

  /**
   * Cheap request for the source's last-modification marker.
   * @throws SnapdeltaError with a transient code on network failures
   */
  fetchMarker(): Promise<Marker>;

  /**
   * Fetch the complete current snapshot as raw tabular rows.
   * @param marker - The marker confirmed by the preceding check
   * @throws SnapdeltaError (transient, or SCHEMA_MISMATCH for unreadable payloads)
   */
  fetchSnapshot(marker: Marker): Promise<RawRow[]>;
}
