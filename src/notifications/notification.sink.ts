import Decimal from 'decimal.js';
import { AlertDirection } from '../alerts/entities/alert.entity';

export interface PriceAlertNotice {
  userId: string;
  ticker: string;
  price: Decimal;
  direction: AlertDirection;
  target: Decimal;
}

/**
 * Delivery channel for triggered alerts.
 * Resolves false when the notice could not be delivered.
 */
export abstract class NotificationSink {
  abstract notify(notice: PriceAlertNotice): Promise<boolean>;
}
