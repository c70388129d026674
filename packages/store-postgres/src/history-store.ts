/**
 * PostgreSQL History Store
 *
 * One append-only table per dataset:
 *
 *   entity_key   TEXT         encoded key tuple
 *   key_parts    JSONB        key tuple as an array
 *   field_values JSONB        canonical field values
 *   change_kind  TEXT         new | changed | dropped
 *   observed_at  TIMESTAMPTZ  marker time of the cycle
 *   recorded_at  TIMESTAMPTZ  wall-clock write time
 *   PRIMARY KEY (entity_key, observed_at)
 *
 * Each batch is written inside one transaction; a re-written row for the
 * same (entity_key, observed_at) replaces the earlier one.
 */

import { z } from 'zod';
import type {
  AppendResult,
  ChangeRecord,
  EntityKey,
  FieldValue,
  IHistoryStore,
  TimeRange,
} from '@snapdelta/core';
import { SnapdeltaError, encodeKey } from '@snapdelta/core';
import { validateIdentifier } from './client.js';
import type { PostgresClient } from './client.js';

export interface PostgresHistoryStoreOptions {
  /** Database schema holding the tables (default: public) */
  schema?: string;
  /** Table name prefix; the dataset name is appended (default: snapdelta_history_) */
  tablePrefix?: string;
  /** Rows per INSERT statement (default: 500) */
  chunkSize?: number;
}

const historyRowSchema = z.object({
  key_parts: z.array(z.string()).min(1),
  field_values: z.record(z.union([z.number(), z.string(), z.null()])),
  change_kind: z.enum(['new', 'changed', 'dropped']),
  observed_at: z.coerce.date(),
});

const SELECT_COLUMNS = 'key_parts, field_values, change_kind, observed_at';
const PARAMS_PER_ROW = 5;

export class PostgresHistoryStore implements IHistoryStore {
  private readonly schema: string;
  private readonly tablePrefix: string;
  private readonly chunkSize: number;
  private readonly ensured = new Set<string>();

  constructor(
    private readonly client: PostgresClient,
    options: PostgresHistoryStoreOptions = {}
  ) {
    this.schema = options.schema ?? 'public';
    this.tablePrefix = options.tablePrefix ?? 'snapdelta_history_';
    this.chunkSize = options.chunkSize ?? 500;
    validateIdentifier(this.schema, 'schema');
  }

  async append(dataset: string, changes: readonly ChangeRecord[]): Promise<AppendResult> {
    if (changes.length === 0) {
      return { written: 0 };
    }

    const table = await this.ensureTable(dataset);

    // One statement may not touch the same conflict target twice
    const rows = new Map<string, ChangeRecord>();
    for (const change of changes) {
      rows.set(`${encodeKey(change.key)}@${change.observedAt.getTime()}`, change);
    }
    const unique = Array.from(rows.values());

    try {
      await this.client.withTransaction(async (query) => {
        for (let start = 0; start < unique.length; start += this.chunkSize) {
          const chunk = unique.slice(start, start + this.chunkSize);
          const params: unknown[] = [];
          const tuples = chunk.map((change, i) => {
            const base = i * PARAMS_PER_ROW;
            params.push(
              encodeKey(change.key),
              JSON.stringify(change.key),
              JSON.stringify(change.values),
              change.changeKind,
              change.observedAt
            );
            return `($${base + 1}, $${base + 2}::jsonb, $${base + 3}::jsonb, $${base + 4}, $${base + 5})`;
          });

          await query(
            `INSERT INTO ${table} (entity_key, key_parts, field_values, change_kind, observed_at)
             VALUES ${tuples.join(', ')}
             ON CONFLICT (entity_key, observed_at) DO UPDATE SET
               key_parts = EXCLUDED.key_parts,
               field_values = EXCLUDED.field_values,
               change_kind = EXCLUDED.change_kind,
               recorded_at = now()`,
            params
          );
        }
      });
    } catch (err) {
      throw this.withDataset(err, dataset);
    }

    return { written: changes.length };
  }

  async latest(dataset: string, key: EntityKey): Promise<ChangeRecord | undefined> {
    const table = await this.ensureTable(dataset);
    const rows = await this.select(
      dataset,
      `SELECT ${SELECT_COLUMNS} FROM ${table}
       WHERE entity_key = $1
       ORDER BY observed_at DESC
       LIMIT 1`,
      [encodeKey(key)]
    );
    return rows[0];
  }

  async latestAll(dataset: string): Promise<Map<string, ChangeRecord>> {
    const table = await this.ensureTable(dataset);
    const rows = await this.select(
      dataset,
      `SELECT DISTINCT ON (entity_key) ${SELECT_COLUMNS} FROM ${table}
       ORDER BY entity_key, observed_at DESC`
    );
    return new Map(rows.map((row) => [encodeKey(row.key), row]));
  }

  async history(dataset: string, key: EntityKey, range?: TimeRange): Promise<ChangeRecord[]> {
    const table = await this.ensureTable(dataset);
    return this.select(
      dataset,
      `SELECT ${SELECT_COLUMNS} FROM ${table}
       WHERE entity_key = $1
         AND ($2::timestamptz IS NULL OR observed_at >= $2)
         AND ($3::timestamptz IS NULL OR observed_at <= $3)
       ORDER BY observed_at ASC`,
      [encodeKey(key), range?.since ?? null, range?.until ?? null]
    );
  }

  async scan(dataset: string, range?: TimeRange): Promise<ChangeRecord[]> {
    const table = await this.ensureTable(dataset);
    return this.select(
      dataset,
      `SELECT ${SELECT_COLUMNS} FROM ${table}
       WHERE ($1::timestamptz IS NULL OR observed_at >= $1)
         AND ($2::timestamptz IS NULL OR observed_at <= $2)
       ORDER BY observed_at ASC, entity_key ASC`,
      [range?.since ?? null, range?.until ?? null]
    );
  }

  async close(): Promise<void> {
    await this.client.disconnect();
  }

  /**
   * Create the dataset table once per store instance; returns its quoted name
   */
  private async ensureTable(dataset: string): Promise<string> {
    const tableName = `${this.tablePrefix}${dataset}`;
    validateIdentifier(tableName, 'table');
    const table = `"${this.schema}"."${tableName}"`;

    if (!this.ensured.has(tableName)) {
      try {
        await this.client.query(
          `CREATE TABLE IF NOT EXISTS ${table} (
             entity_key TEXT NOT NULL,
             key_parts JSONB NOT NULL,
             field_values JSONB NOT NULL,
             change_kind TEXT NOT NULL CHECK (change_kind IN ('new', 'changed', 'dropped')),
             observed_at TIMESTAMPTZ NOT NULL,
             recorded_at TIMESTAMPTZ NOT NULL DEFAULT now(),
             PRIMARY KEY (entity_key, observed_at)
           )`,
          [],
          'STORE_WRITE_FAILED'
        );
      } catch (err) {
        throw this.withDataset(err, dataset);
      }
      this.ensured.add(tableName);
    }

    return table;
  }

  private async select(dataset: string, sql: string, params: unknown[] = []): Promise<ChangeRecord[]> {
    let rows: unknown[];
    try {
      rows = (await this.client.query(sql, params)).rows;
    } catch (err) {
      throw this.withDataset(err, dataset);
    }

    return rows.map((row) => {
      const parsed = historyRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new SnapdeltaError({
          code: 'STORE_READ_FAILED',
          message: 'History table contains a row of unexpected shape',
          dataset,
          context: { issues: parsed.error.issues },
        });
      }
      const values: Record<string, FieldValue> = parsed.data.field_values;
      return {
        key: parsed.data.key_parts,
        values,
        observedAt: parsed.data.observed_at,
        changeKind: parsed.data.change_kind,
      };
    });
  }

  private withDataset(err: unknown, dataset: string): SnapdeltaError {
    if (err instanceof SnapdeltaError && !err.dataset) {
      return new SnapdeltaError({
        code: err.code,
        message: err.message,
        dataset,
        suggestion: err.suggestion,
        context: err.context,
        cause: err,
      });
    }
    if (err instanceof SnapdeltaError) return err;
    return new SnapdeltaError({
      code: 'UNKNOWN',
      message: err instanceof Error ? err.message : String(err),
      dataset,
      cause: err instanceof Error ? err : undefined,
    });
  }
}
