import type { Marker } from '../types/index.js';

/**
 * Durable single-value slot per dataset holding the last successfully
 * processed marker. Must survive a process restart.
 */
export interface IMarkerStore {
  get(dataset: string): Promise<Marker | undefined>;
  set(dataset: string, marker: Marker): Promise<void>;
  close(): Promise<void>;
}
