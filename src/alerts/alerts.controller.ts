import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Patch, Post } from '@nestjs/common';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { toMoney } from '../common/utils/decimal.util';
import { Alert } from './entities/alert.entity';
import { AlertsService } from './alerts.service';
import { CreateAlertDto } from './dto/create-alert.dto';
import { UpdateAlertDto } from './dto/update-alert.dto';
import { AlertResponseDto } from './dto/alert-response.dto';

const toResponse = (alert: Alert): AlertResponseDto => ({
  id: alert.id,
  ownerId: alert.ownerId,
  ticker: alert.ticker,
  targetPrice: toMoney(alert.targetPrice),
  direction: alert.direction,
  active: alert.active,
  createdAt: alert.createdAt.toISOString(),
});

@Controller('alerts')
export class AlertsController {
  constructor(private readonly alertsService: AlertsService) {}

  /** POST /alerts */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createAlert(@CurrentUser() userId: string, @Body() dto: CreateAlertDto): Promise<AlertResponseDto> {
    return toResponse(await this.alertsService.createAlert(userId, dto));
  }

  /** GET /alerts */
  @Get()
  async listAlerts(@CurrentUser() userId: string): Promise<AlertResponseDto[]> {
    const alerts = await this.alertsService.listAlerts(userId);
    return alerts.map(toResponse);
  }

  /**
   * Changes target/direction/ticker, or re-arms with { "active": true }.
   *
   * PATCH /alerts/:id
   */
  @Patch(':id')
  async updateAlert(
    @CurrentUser() userId: string,
    @Param('id') id: string,
    @Body() dto: UpdateAlertDto,
  ): Promise<AlertResponseDto> {
    return toResponse(await this.alertsService.updateAlert(userId, id, dto));
  }

  /** DELETE /alerts/:id */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteAlert(@CurrentUser() userId: string, @Param('id') id: string): Promise<void> {
    await this.alertsService.deleteAlert(userId, id);
  }
}
