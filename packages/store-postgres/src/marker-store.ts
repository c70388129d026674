/**
 * PostgreSQL Marker Store
 *
 * Single-row-per-dataset slot in the snapdelta_markers table.
 */

import { z } from 'zod';
import type { IMarkerStore, Marker } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';
import { validateIdentifier } from './client.js';
import type { PostgresClient } from './client.js';

export interface PostgresMarkerStoreOptions {
  schema?: string;
  /** default: snapdelta_markers */
  table?: string;
}

const markerRowSchema = z.object({
  token: z.string(),
  observed_at: z.coerce.date(),
});

export class PostgresMarkerStore implements IMarkerStore {
  private readonly table: string;
  private ensured = false;

  constructor(
    private readonly client: PostgresClient,
    options: PostgresMarkerStoreOptions = {}
  ) {
    const schema = options.schema ?? 'public';
    const table = options.table ?? 'snapdelta_markers';
    validateIdentifier(schema, 'schema');
    validateIdentifier(table, 'table');
    this.table = `"${schema}"."${table}"`;
  }

  async get(dataset: string): Promise<Marker | undefined> {
    await this.ensureTable();
    const result = await this.client.query(
      `SELECT token, observed_at FROM ${this.table} WHERE dataset = $1`,
      [dataset]
    );

    const row = result.rows[0];
    if (!row) return undefined;

    const parsed = markerRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new SnapdeltaError({
        code: 'STORE_READ_FAILED',
        message: 'Marker row has an unexpected shape',
        dataset,
        context: { issues: parsed.error.issues },
      });
    }
    return { token: parsed.data.token, observedAt: parsed.data.observed_at };
  }

  async set(dataset: string, marker: Marker): Promise<void> {
    await this.ensureTable();
    await this.client.query(
      `INSERT INTO ${this.table} (dataset, token, observed_at, updated_at)
       VALUES ($1, $2, $3, now())
       ON CONFLICT (dataset) DO UPDATE SET
         token = EXCLUDED.token,
         observed_at = EXCLUDED.observed_at,
         updated_at = now()`,
      [dataset, marker.token, marker.observedAt],
      'STORE_WRITE_FAILED'
    );
  }

  async close(): Promise<void> {
    await this.client.disconnect();
  }

  private async ensureTable(): Promise<void> {
    if (this.ensured) return;
    await this.client.query(
      `CREATE TABLE IF NOT EXISTS ${this.table} (
         dataset TEXT PRIMARY KEY,
         token TEXT NOT NULL,
         observed_at TIMESTAMPTZ NOT NULL,
         updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
       )`,
      [],
      'STORE_WRITE_FAILED'
    );
    this.ensured = true;
  }
}
