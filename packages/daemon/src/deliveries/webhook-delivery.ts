/**
 * Webhook Delivery
 *
 * POSTs each event (and each operator alert) as JSON to a configured URL.
 */

import type { IEventDelivery, OperatorAlert, OutboundEvent } from '@snapdelta/core';
import { SnapdeltaError } from '@snapdelta/core';
import type { FetchFn } from '@snapdelta/sources';

export interface WebhookDeliveryConfig {
  url: string;
  headers?: Record<string, string>;
  /** Per-request timeout (default: 10000ms) */
  timeoutMs?: number;
}

export function eventPayload(event: OutboundEvent): Record<string, unknown> {
  return {
    type: 'change',
    dataset: event.dataset,
    subject: event.subject,
    key: [...event.key],
    changeKind: event.changeKind,
    value: event.value,
    delta: event.delta,
    observedAt: event.observedAt.toISOString(),
    values: event.record.values,
  };
}

function alertPayload(alert: OperatorAlert): Record<string, unknown> {
  return {
    type: 'alert',
    dataset: alert.dataset,
    severity: alert.severity,
    code: alert.code,
    message: alert.message,
    at: alert.at.toISOString(),
  };
}

export class WebhookDelivery implements IEventDelivery {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly config: WebhookDeliveryConfig,
    fetchFn?: FetchFn
  ) {
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init));
  }

  async deliver(event: OutboundEvent): Promise<void> {
    await this.post(eventPayload(event), event.dataset);
  }

  async alert(alert: OperatorAlert): Promise<void> {
    await this.post(alertPayload(alert), alert.dataset);
  }

  private async post(payload: Record<string, unknown>, dataset: string): Promise<void> {
    const timeoutMs = this.config.timeoutMs ?? 10_000;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await this.fetchFn(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.config.headers },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'AbortError';
      throw new SnapdeltaError({
        code: 'DELIVERY_FAILED',
        message: timedOut
          ? `Webhook timed out after ${timeoutMs}ms`
          : `Webhook request failed: ${err instanceof Error ? err.message : String(err)}`,
        dataset,
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new SnapdeltaError({
        code: 'DELIVERY_FAILED',
        message: `Webhook returned HTTP ${response.status}`,
        dataset,
        suggestion: 'Check the webhook URL and the receiving service.',
        context: { status: response.status },
      });
    }
  }
}
