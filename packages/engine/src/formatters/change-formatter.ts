/**
 * Change Formatter
 *
 * Plain-text rendering of diff results and outbound events for logs and
 * the CLI.
 */

import type { OutboundEvent } from '@snapdelta/core';
import { formatKey } from '@snapdelta/core';
import type { DiffResult } from '../diff/diff-engine.js';

const PREVIEW_LIMIT = 10;

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
}

/**
 * Format a signed delta: "+1.5", "-2", "±0"
 */
export function formatDelta(delta: number | null): string {
  if (delta === null) return 'n/a';
  if (delta === 0) return '±0';
  return delta > 0 ? `+${formatNumber(delta)}` : formatNumber(delta);
}

/**
 * One-line summary of an event, e.g. "[changed] ACME AB: 0.62 (+0.1) @ 2024-03-01"
 */
export function formatEvent(event: OutboundEvent): string {
  const value =
    event.value === null ? 'n/a' : typeof event.value === 'number' ? formatNumber(event.value) : event.value;
  const delta = event.delta === null ? '' : ` (${formatDelta(event.delta)})`;
  const day = event.observedAt.toISOString().slice(0, 10);
  return `[${event.changeKind}] ${event.subject}: ${value}${delta} @ ${day}`;
}

/**
 * Format a diff result as plain text
 */
export function formatDiffSummary(dataset: string, observedAt: Date, diff: DiffResult): string {
  const lines: string[] = [];

  lines.push(`## Changes for ${dataset}`);
  lines.push(`Observed: ${observedAt.toISOString()}`);
  lines.push('');

  if (diff.changes.length === 0) {
    lines.push('No changes detected.');
    return lines.join('\n');
  }

  const sections = [
    ['New', diff.newSet],
    ['Changed', diff.changedSet],
    ['Dropped', diff.droppedSet],
  ] as const;

  for (const [title, records] of sections) {
    if (records.length === 0) continue;
    lines.push(`### ${title} (${records.length})`);
    for (const record of records.slice(0, PREVIEW_LIMIT)) {
      lines.push(`- ${formatKey(record.key)}`);
    }
    if (records.length > PREVIEW_LIMIT) {
      lines.push(`... and ${records.length - PREVIEW_LIMIT} more`);
    }
    lines.push('');
  }

  lines.push('---');
  lines.push(`Total: ${diff.changes.length}`);
  return lines.join('\n');
}
