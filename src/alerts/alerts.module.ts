import { Module } from '@nestjs/common';
import { AlertsController } from './alerts.controller';
import { AlertsService } from './alerts.service';
import { AlertRepository } from './alert.repository';
import { AlertStorageService } from './alert-storage.service';

// AlertEvaluatorService is built per run by the refresh job, on the job's own cache connection.
@Module({
  controllers: [AlertsController],
  providers: [{ provide: AlertRepository, useClass: AlertStorageService }, AlertsService],
  exports: [AlertRepository],
})
export class AlertsModule {}
