import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Patch, Post } from '@nestjs/common';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { PortfolioService } from './portfolio.service';
import { CreateHoldingDto } from './dto/create-holding.dto';
import { UpdateHoldingDto } from './dto/update-holding.dto';
import { ContributePositionDto } from './dto/contribute-position.dto';
import { HistoryEntryDto, HoldingResponseDto, HoldingSummaryDto, PositionDto } from './dto/holding-response.dto';
import { toHistoryEntry, toHoldingResponse, toHoldingSummary, toPositionDto } from './portfolio.mapper';

@Controller('holdings')
export class PortfolioController {
  constructor(private readonly portfolioService: PortfolioService) {}

  /**
   * POST /holdings
   * @returns 201, or 409 when the name is taken
   */
  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createHolding(
    @CurrentUser() userId: string,
    @Body() dto: CreateHoldingDto,
  ): Promise<HoldingSummaryDto> {
    return toHoldingSummary(await this.portfolioService.createHolding(userId, dto));
  }

  /** GET /holdings */
  @Get()
  async listHoldings(@CurrentUser() userId: string): Promise<HoldingSummaryDto[]> {
    const holdings = await this.portfolioService.listHoldings(userId);
    return holdings.map(toHoldingSummary);
  }

  /**
   * Holding with current prices, value and PnL.
   *
   * GET /holdings/:id
   */
  @Get(':id')
  async getHolding(@CurrentUser() userId: string, @Param('id') id: string): Promise<HoldingResponseDto> {
    return toHoldingResponse(await this.portfolioService.getValuatedHolding(userId, id));
  }

  /** PATCH /holdings/:id */
  @Patch(':id')
  async updateHolding(
    @CurrentUser() userId: string,
    @Param('id') id: string,
    @Body() dto: UpdateHoldingDto,
  ): Promise<HoldingSummaryDto> {
    return toHoldingSummary(await this.portfolioService.updateHolding(userId, id, dto));
  }

  /** DELETE /holdings/:id - cascades to positions and history */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async deleteHolding(@CurrentUser() userId: string, @Param('id') id: string): Promise<void> {
    await this.portfolioService.deleteHolding(userId, id);
  }

  /**
   * Adds to a position, merging at weighted-average cost.
   *
   * POST /holdings/:id/positions
   */
  @Post(':id/positions')
  @HttpCode(HttpStatus.CREATED)
  async contribute(
    @CurrentUser() userId: string,
    @Param('id') id: string,
    @Body() dto: ContributePositionDto,
  ): Promise<PositionDto> {
    return toPositionDto(await this.portfolioService.contribute(userId, id, dto));
  }

  /** DELETE /holdings/:id/positions/:ticker */
  @Delete(':id/positions/:ticker')
  @HttpCode(HttpStatus.NO_CONTENT)
  async removePosition(
    @CurrentUser() userId: string,
    @Param('id') id: string,
    @Param('ticker') ticker: string,
  ): Promise<void> {
    await this.portfolioService.removePosition(userId, id, ticker);
  }

  /** GET /holdings/:id/history */
  @Get(':id/history')
  async getHistory(@CurrentUser() userId: string, @Param('id') id: string): Promise<HistoryEntryDto[]> {
    const snapshots = await this.portfolioService.getHistory(userId, id);
    return snapshots.map(toHistoryEntry);
  }
}
