import { Module } from '@nestjs/common';
import { NotificationSink } from './notification.sink';
import { LoggingNotificationService } from './notification.service';

@Module({
  providers: [{ provide: NotificationSink, useClass: LoggingNotificationService }],
  exports: [NotificationSink],
})
export class NotificationsModule {}
