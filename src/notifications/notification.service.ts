import { Injectable, Logger } from '@nestjs/common';
import { NotificationSink, PriceAlertNotice } from './notification.sink';

export interface AlertEmail {
  to: string;
  subject: string;
  body: string;
}

export function composeAlertEmail(notice: PriceAlertNotice): AlertEmail {
  const direction = notice.direction.toLowerCase();
  return {
    to: notice.userId,
    subject: `Price Alert: ${notice.ticker} is ${direction} ${notice.target.toFixed(2)}`,
    body: `Hello user ${notice.userId}, your alert for ${notice.ticker} was triggered! Current price: ${notice.price.toString()}`,
  };
}

// Mock e-mail delivery: writes the message to the log.
@Injectable()
export class LoggingNotificationService extends NotificationSink {
  private readonly logger = new Logger(LoggingNotificationService.name);

  async notify(notice: PriceAlertNotice): Promise<boolean> {
    const email = composeAlertEmail(notice);
    this.logger.log(`[MOCK EMAIL] To user ${email.to} | ${email.subject} | ${email.body}`);
    return true;
  }
}
