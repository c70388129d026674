#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   snapdelta run --config ./snapdelta.json
 *   snapdelta once --config ./snapdelta.json [--dataset <id>]
 *   snapdelta export --config ./snapdelta.json --dataset <id> [--since 2024-01-01] [--until 2024-12-31] [--out file.csv]
 *   snapdelta validate --config ./snapdelta.json
 */

import { writeFile } from 'node:fs/promises';
import type { Server } from 'node:http';
import type { TimeRange } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';
import { exportHistoryCsv, formatDiffSummary } from '@snapdelta/engine';
import { USAGE, argValue, parseDateArg } from './cli-args.js';
import { loadConfig } from './config.js';
import type { ConfigFile } from './config.js';
import { closeStatusServer, startStatusServer } from './http-server.js';
import { Logger } from './logger.js';
import { metrics } from './metrics.js';
import { createRuntime, createStores } from './runtime.js';

function createLogger(config: ConfigFile): Logger {
  return new Logger({
    level: config.logging?.level,
    format: config.logging?.format,
  });
}

async function runCommand(config: ConfigFile, logger: Logger): Promise<void> {
  const runtime = await createRuntime(config, logger, metrics);
  let statusServer: Server | undefined;

  if (config.http) {
    statusServer = await startStatusServer(config.http, { metrics, health: runtime.health }, logger);
  }

  const shutdown = (signal: string) => {
    runtime.supervisor.stop(signal);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await runtime.supervisor.run();
  } finally {
    if (statusServer) await closeStatusServer(statusServer);
    await runtime.close();
    logger.info('Shutdown complete');
  }
}

async function onceCommand(config: ConfigFile, logger: Logger, datasetId?: string): Promise<number> {
  const runtime = await createRuntime(config, logger, metrics);
  let failures = 0;

  try {
    const schedulers = datasetId
      ? [runtime.registry.getOrThrow(datasetId)]
      : runtime.registry.list();

    for (const scheduler of schedulers) {
      const outcome = await scheduler.runCycle();
      if (outcome.kind === 'processed') {
        process.stdout.write(
          `${formatDiffSummary(scheduler.dataset, outcome.marker.observedAt, outcome.diff)}\n\n`
        );
      } else if (outcome.kind === 'skipped') {
        process.stdout.write(`${scheduler.dataset}: unchanged (marker ${outcome.marker.token})\n`);
      } else {
        failures++;
        process.stdout.write(`${outcome.error.toActionableMessage()}\n`);
      }
    }
  } finally {
    await runtime.close();
  }

  return failures === 0 ? 0 : 1;
}

async function exportCommand(config: ConfigFile, logger: Logger, args: readonly string[]): Promise<void> {
  const datasetId = argValue(args, '--dataset');
  if (!datasetId) {
    throw new SnapdeltaError({
      code: 'INVALID_OPTIONS',
      message: 'export requires --dataset',
      suggestion: `Configured datasets: ${config.datasets.map((d) => d.id).join(', ')}`,
    });
  }

  const entry = config.datasets.find((d) => d.id === datasetId);
  if (!entry) {
    throw new SnapdeltaError({
      code: 'CONFIGURATION_ERROR',
      message: `Dataset '${datasetId}' not found`,
      suggestion: `Configured datasets: ${config.datasets.map((d) => d.id).join(', ')}`,
    });
  }

  const since = argValue(args, '--since');
  const until = argValue(args, '--until');
  const range: TimeRange = {
    since: since ? parseDateArg(since, false) : undefined,
    until: until ? parseDateArg(until, true) : undefined,
  };

  const stores = await createStores(config.store, logger);
  try {
    const csv = await exportHistoryCsv(stores.history, entry.schema, {
      range,
      delimiter: argValue(args, '--delimiter'),
    });
    const out = argValue(args, '--out');
    if (out) {
      await writeFile(out, csv, 'utf-8');
    } else {
      process.stdout.write(csv);
    }
  } finally {
    await stores.close();
  }
}

async function main(): Promise<void> {
  let logger = new Logger();
  const args = process.argv.slice(2);
  const command = args[0];

  try {
    const configPath = argValue(args, '--config');
    if (!command || command.startsWith('--') || !configPath) {
      process.stderr.write(`${USAGE}\n`);
      process.exit(1);
    }

    const config = await loadConfig(configPath);
    logger = createLogger(config);

    switch (command) {
      case 'run':
        await runCommand(config, logger);
        break;
      case 'once':
        process.exitCode = await onceCommand(config, logger, argValue(args, '--dataset'));
        break;
      case 'export':
        await exportCommand(config, logger, args);
        break;
      case 'validate':
        process.stdout.write(`Config OK: ${config.datasets.length} dataset(s)\n`);
        break;
      default:
        process.stderr.write(`Unknown command: ${command}\n\n${USAGE}\n`);
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof SnapdeltaError) {
      logger.error(error.toActionableMessage(), { code: error.code });
    } else {
      logger.error('Command failed', { error });
    }
    process.exit(1);
  }
}

void main();
