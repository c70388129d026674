import type { IEventDelivery, OperatorAlert, OutboundEvent } from '@snapdelta/core';
import { formatEvent } from '@snapdelta/engine';
import type { Logger } from '../logger.js';

/**
 * Writes events and alerts to the daemon log
 */
export class LogDelivery implements IEventDelivery {
  constructor(private readonly logger: Logger) {}

  async deliver(event: OutboundEvent): Promise<void> {
    this.logger.info(formatEvent(event), {
      dataset: event.dataset,
      changeKind: event.changeKind,
    });
  }

  async alert(alert: OperatorAlert): Promise<void> {
    const level = alert.severity === 'critical' ? 'error' : 'warn';
    this.logger.log(level, `ALERT ${alert.message}`, { dataset: alert.dataset, code: alert.code });
  }
}
