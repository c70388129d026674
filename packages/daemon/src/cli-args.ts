import { SnapdeltaError } from '@snapdelta/core';

export const USAGE = [
  'Usage: snapdelta <command> --config <config.json> [options]',
  '',
  'Commands:',
  '  run                         Poll every dataset until SIGINT/SIGTERM',
  '  once [--dataset <id>]       Run a single cycle per dataset and exit',
  '  export --dataset <id>       Write the change history as CSV',
  '         [--since <date>] [--until <date>] [--out <file>] [--delimiter <char>]',
  '  validate                    Check the config file and exit',
].join('\n');

export function argValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new SnapdeltaError({
      code: 'INVALID_OPTIONS',
      message: `Missing value for ${flag}`,
      suggestion: USAGE,
    });
  }
  return value;
}

/**
 * Parse a --since/--until value; a bare date covers the whole day
 */
export function parseDateArg(value: string, endOfDay: boolean): Date {
  const bareDate = /^\d{4}-\d{2}-\d{2}$/.test(value);
  const date = new Date(bareDate ? `${value}T${endOfDay ? '23:59:59.999' : '00:00:00.000'}Z` : value);
  if (Number.isNaN(date.getTime())) {
    throw new SnapdeltaError({
      code: 'INVALID_OPTIONS',
      message: `Invalid date: ${value}`,
      suggestion: 'Use YYYY-MM-DD or an ISO-8601 timestamp.',
    });
  }
  return date;
}
