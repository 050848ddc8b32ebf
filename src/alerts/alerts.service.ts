import { ForbiddenException, Injectable, NotFoundException } from '@nestjs/common';
import { roundMoney, toDecimal } from '../common/utils/decimal.util';
import { Alert } from './entities/alert.entity';
import { CreateAlertDto } from './dto/create-alert.dto';
import { UpdateAlertDto } from './dto/update-alert.dto';
import { AlertRepository } from './alert.repository';

@Injectable()
export class AlertsService {
  constructor(private readonly repository: AlertRepository) {}

  /** New alerts start active */
  async createAlert(userId: string, dto: CreateAlertDto): Promise<Alert> {
    return this.repository.create({
      ownerId: userId,
      ticker: dto.ticker.toUpperCase(),
      targetPrice: roundMoney(toDecimal(dto.targetPrice)),
      direction: dto.direction,
    });
  }

  async listAlerts(userId: string): Promise<Alert[]> {
    return this.repository.findByOwner(userId);
  }

  /**
   * @throws NotFoundException if the alert does not exist
   * @throws ForbiddenException if it belongs to another user
   */
  async getAlert(userId: string, alertId: string): Promise<Alert> {
    const alert = await this.repository.findById(alertId);
    if (!alert) {
      throw new NotFoundException('Alert not found');
    }
    if (alert.ownerId !== userId) {
      throw new ForbiddenException('Not authorized to access this alert');
    }
    return alert;
  }

  /** Only way to re-arm a fired alert (active=true) */
  async updateAlert(userId: string, alertId: string, dto: UpdateAlertDto): Promise<Alert> {
    const alert = await this.getAlert(userId, alertId);
    const updated = await this.repository.update(alert.id, {
      ticker: dto.ticker?.toUpperCase(),
      targetPrice: dto.targetPrice === undefined ? undefined : roundMoney(toDecimal(dto.targetPrice)),
      direction: dto.direction,
      active: dto.active,
    });
    if (!updated) {
      throw new NotFoundException('Alert not found');
    }
    return updated;
  }

  async deleteAlert(userId: string, alertId: string): Promise<void> {
    const alert = await this.getAlert(userId, alertId);
    await this.repository.delete(alert.id);
  }
}
