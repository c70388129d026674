import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { SnapdeltaError, datasetNameSchema, datasetSchemaSchema } from '@snapdelta/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function configError(message: string, suggestion?: string): SnapdeltaError {
  return new SnapdeltaError({ code: 'CONFIGURATION_ERROR', message, suggestion });
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variable source (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw configError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Replace ${NAME} and ${NAME:-default} in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const positiveInt = z.number().int().positive();

const csvOptions = z
  .object({
    delimiter: z.string().min(1).optional(),
    quote: z.string().length(1).optional(),
    skipRows: z.number().int().min(0).optional(),
    headers: z.boolean().optional(),
  })
  .strict();

const excelOptions = z
  .object({
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    startRow: z.number().int().min(1).optional(),
    headers: z.boolean().optional(),
  })
  .strict();

const jsonOptions = z
  .object({
    recordsPath: z.string().min(1).optional(),
  })
  .strict();

const readOptions = {
  format: z.enum(['csv', 'excel', 'json']),
  encoding: z.enum(['utf-8', 'utf8', 'latin1', 'ascii', 'utf16le']).optional(),
  csv: csvOptions.optional(),
  excel: excelOptions.optional(),
  json: jsonOptions.optional(),
};

const markerSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('http-header'),
      url: z.string().url().optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('page-pattern'),
      url: z.string().url().optional(),
      pattern: z.string().min(1),
      flags: z
        .string()
        .regex(/^[imsu]*$/, 'only the i, m, s and u flags are allowed')
        .optional(),
    })
    .strict(),
  z
    .object({
      type: z.literal('time-bucket'),
      bucketMs: z.number().int().min(1000),
    })
    .strict(),
]);

const sourceSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('file'),
      filePath: z.string().min(1),
      ...readOptions,
    })
    .strict(),
  z
    .object({
      type: z.literal('http'),
      url: z.string().url(),
      marker: markerSchema,
      headers: z.record(z.string()).optional(),
      timeoutMs: positiveInt.optional(),
      ...readOptions,
    })
    .strict(),
]);

export const scheduleSchema = z.union([
  z.object({ pollIntervalMs: z.number().int().min(1000) }).strict(),
  z
    .object({
      dailyAt: z.string().regex(/^([01]\d|2[0-3]):([0-5]\d)$/, 'must be HH:MM (24-hour)'),
    })
    .strict(),
]);

const backoffSchema = z
  .object({
    baseDelayMs: positiveInt.optional(),
    maxDelayMs: positiveInt.optional(),
    escalateAfter: positiveInt.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.baseDelayMs !== undefined && value.maxDelayMs !== undefined && value.baseDelayMs > value.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'baseDelayMs must not exceed maxDelayMs',
        path: ['baseDelayMs'],
      });
    }
  });

const timeoutsSchema = z
  .object({
    markerMs: positiveInt.optional(),
    fetchMs: positiveInt.optional(),
    deliveryMs: positiveInt.optional(),
  })
  .strict();

const notifySchema = z
  .object({
    trackedKeys: z.array(z.string().min(1)),
    match: z.enum(['exact', 'substring']).optional(),
    labelField: z.string().min(1).optional(),
    valueField: z.string().min(1),
    kinds: z.array(z.enum(['new', 'changed', 'dropped'])).min(1).optional(),
  })
  .strict();

/** The dataset id doubles as the schema's dataset name */
function injectDatasetName(value: unknown): unknown {
  if (!isPlainObject(value) || typeof value.id !== 'string' || !isPlainObject(value.schema)) {
    return value;
  }
  if (value.schema.dataset !== undefined) return value;
  return { ...value, schema: { ...value.schema, dataset: value.id } };
}

export const datasetEntrySchema = z.preprocess(
  injectDatasetName,
  z
    .object({
      id: datasetNameSchema,
      schema: datasetSchemaSchema,
      source: sourceSchema,
      schedule: scheduleSchema,
      backoff: backoffSchema.optional(),
      timeouts: timeoutsSchema.optional(),
      notify: notifySchema.optional(),
    })
    .strict()
    .superRefine((value, ctx) => {
      if (value.schema.dataset !== value.id) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `schema.dataset must match the dataset id '${value.id}'`,
          path: ['schema', 'dataset'],
        });
      }

      const fieldNames = new Set(value.schema.fields.map((field) => field.name));
      for (const key of ['valueField', 'labelField'] as const) {
        const name = value.notify?.[key];
        if (name !== undefined && !fieldNames.has(name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown field '${name}'`,
            path: ['notify', key],
          });
        }
      }
    })
);

export type DatasetEntry = z.infer<typeof datasetEntrySchema>;
export type SourceEntry = DatasetEntry['source'];

const storeSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('file'),
      dir: z.string().min(1).default('./.snapdelta'),
    })
    .strict(),
  z.object({ type: z.literal('memory') }).strict(),
  z
    .object({
      type: z.literal('postgresql'),
      connectionString: z.string().min(1).optional(),
      host: z.string().min(1).optional(),
      port: z.number().int().min(1).max(65535).optional(),
      database: z.string().min(1).optional(),
      user: z.string().min(1).optional(),
      password: z.string().optional(),
      ssl: z
        .union([z.boolean(), z.object({ rejectUnauthorized: z.boolean().optional() }).strict()])
        .optional(),
      schema: z.string().min(1).optional(),
      tablePrefix: z.string().min(1).optional(),
      markerTable: z.string().min(1).optional(),
    })
    .strict(),
]);

export type StoreConfig = z.infer<typeof storeSchema>;

const deliverySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('log') }).strict(),
  z
    .object({
      type: z.literal('webhook'),
      url: z.string().url(),
      headers: z.record(z.string()).optional(),
      timeoutMs: positiveInt.optional(),
    })
    .strict(),
]);

export type DeliveryConfig = z.infer<typeof deliverySchema>;

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    store: storeSchema.default({ type: 'file', dir: './.snapdelta' }),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
    delivery: deliverySchema.default({ type: 'log' }),
    http: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(1).max(65535).optional(),
        metricsPath: z.string().startsWith('/').optional(),
        healthPath: z.string().startsWith('/').optional(),
      })
      .strict()
      .optional(),
    defaults: z
      .object({
        backoff: backoffSchema.optional(),
        timeouts: timeoutsSchema.optional(),
      })
      .strict()
      .optional(),
    datasets: z.array(datasetEntrySchema).min(1),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.store.type === 'postgresql' && !value.store.connectionString && !value.store.host) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Provide connectionString or host',
        path: ['store', 'connectionString'],
      });
    }

    const ids = new Set<string>();
    value.datasets.forEach((entry, i) => {
      if (ids.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate dataset id: ${entry.id}`,
          path: ['datasets', i, 'id'],
        });
      }
      ids.add(entry.id);
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

/**
 * Validate an already parsed config object (env vars expanded first)
 */
export function parseConfig(raw: unknown, options?: EnvExpansionOptions): ConfigFile {
  const result = configFileSchema.safeParse(expandEnvVars(raw, options));
  if (!result.success) {
    throw configError(formatZodError(result.error), 'Fix the listed entries and restart.');
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new SnapdeltaError({
      code: 'CONFIGURATION_ERROR',
      message: `Cannot read config file ${absolutePath}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err instanceof Error ? err : undefined,
    });
  }

  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (err) {
    throw configError(
      `Config file ${absolutePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseConfig(parsed);
}
