import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PriceCacheService } from '../market-data/price-cache.service';
import { NotificationSink } from '../notifications/notification.sink';
import { Alert, AlertDirection } from './entities/alert.entity';
import { AlertRepository } from './alert.repository';

/** Strict comparison: a price equal to the target does not fire. */
export function isTriggered(alert: Pick<Alert, 'direction' | 'targetPrice'>, price: Decimal): boolean {
  switch (alert.direction) {
    case AlertDirection.ABOVE:
      return price.greaterThan(alert.targetPrice);
    case AlertDirection.BELOW:
      return price.lessThan(alert.targetPrice);
  }
}

// Checks active alerts against cached prices only; never fetches.
// Fired alerts are notified, then deactivated together in one write.
@Injectable()
export class AlertEvaluatorService {
  private readonly logger = new Logger(AlertEvaluatorService.name);

  constructor(
    private readonly alerts: AlertRepository,
    private readonly cache: PriceCacheService,
    private readonly notifier: NotificationSink,
  ) {}

  /**
   * @returns number of alerts that fired
   */
  async evaluateActive(): Promise<number> {
    const active = await this.alerts.findAllActive();
    const fired: string[] = [];

    for (const alert of active) {
      const price = await this.cache.get(alert.ticker);
      if (!price || !isTriggered(alert, price)) {
        continue;
      }

      this.logger.log(
        `Alert ${alert.id} triggered: ${alert.ticker} ${price.toString()} ${alert.direction} ${alert.targetPrice.toFixed(2)}`,
      );
      await this.dispatch(alert, price);
      fired.push(alert.id);
    }

    if (fired.length > 0) {
      await this.alerts.deactivateMany(fired);
    }
    return fired.length;
  }

  // Best effort: a failed notification does not keep the alert armed.
  private async dispatch(alert: Alert, price: Decimal): Promise<void> {
    try {
      const delivered = await this.notifier.notify({
        userId: alert.ownerId,
        ticker: alert.ticker,
        price,
        direction: alert.direction,
        target: alert.targetPrice,
      });
      if (!delivered) {
        this.logger.warn(`Notification for alert ${alert.id} was not delivered`);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Notification for alert ${alert.id} failed: ${reason}`);
    }
  }
}
