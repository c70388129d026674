import type { IMarkerStore, Marker } from '@snapdelta/core';

export class MemoryMarkerStore implements IMarkerStore {
  private readonly markers = new Map<string, Marker>();

  async get(dataset: string): Promise<Marker | undefined> {
    return this.markers.get(dataset);
  }

  async set(dataset: string, marker: Marker): Promise<void> {
    this.markers.set(dataset, { ...marker });
  }

  async close(): Promise<void> {
    this.markers.clear();
  }
}
