import { ConflictException, ForbiddenException, Injectable, NotFoundException } from '@nestjs/common';
import { toDecimal } from '../common/utils/decimal.util';
import { Holding } from './entities/holding.entity';
import { Position } from './entities/position.entity';
import { HistorySnapshot } from './entities/history-snapshot.entity';
import { ValuatedHolding } from './entities/valuation.entity';
import { CreateHoldingDto } from './dto/create-holding.dto';
import { UpdateHoldingDto } from './dto/update-holding.dto';
import { ContributePositionDto } from './dto/contribute-position.dto';
import { DuplicateKeyError, ForeignKeyError, PortfolioRepository } from './portfolio.repository';
import { PositionLedgerService } from './position-ledger.service';
import { ValuationService } from './valuation.service';

// Holding lifecycle and authorization in front of the ledger and valuation engine.
// Every operation acts on behalf of a user and checks ownership first.
@Injectable()
export class PortfolioService {
  constructor(
    private readonly repository: PortfolioRepository,
    private readonly ledger: PositionLedgerService,
    private readonly valuation: ValuationService,
  ) {}

  /**
   * @throws ConflictException if the user already has a holding with this name
   */
  async createHolding(userId: string, dto: CreateHoldingDto): Promise<Holding> {
    const existing = await this.repository.findHoldingsByOwner(userId);
    if (existing.some((holding) => holding.name === dto.name)) {
      throw this.duplicateName(dto.name);
    }

    try {
      return await this.repository.createHolding({
        ownerId: userId,
        name: dto.name,
        description: dto.description,
      });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw this.duplicateName(dto.name);
      }
      throw error;
    }
  }

  /** Lightweight list, positions excluded */
  async listHoldings(userId: string): Promise<Holding[]> {
    return this.repository.findHoldingsByOwner(userId);
  }

  /**
   * @throws NotFoundException if the holding does not exist
   * @throws ForbiddenException if it belongs to another user
   */
  async getHolding(userId: string, holdingId: string): Promise<Holding> {
    const holding = await this.repository.findHoldingById(holdingId);
    return this.assertOwner(userId, holding);
  }

  /** Holding with positions priced; unpriced positions are returned without values. */
  async getValuatedHolding(userId: string, holdingId: string): Promise<ValuatedHolding> {
    const holding = this.assertOwner(userId, await this.repository.findHoldingWithPositions(holdingId));
    return this.valuation.valuate(holding);
  }

  async updateHolding(userId: string, holdingId: string, dto: UpdateHoldingDto): Promise<Holding> {
    const holding = await this.getHolding(userId, holdingId);

    if (dto.name !== undefined && dto.name !== holding.name) {
      const siblings = await this.repository.findHoldingsByOwner(userId);
      if (siblings.some((sibling) => sibling.name === dto.name)) {
        throw this.duplicateName(dto.name);
      }
    }

    try {
      const updated = await this.repository.updateHolding(holding.id, {
        name: dto.name,
        description: dto.description,
      });
      if (!updated) {
        throw new NotFoundException('Holding not found');
      }
      return updated;
    } catch (error) {
      if (error instanceof DuplicateKeyError && dto.name !== undefined) {
        throw this.duplicateName(dto.name);
      }
      throw error;
    }
  }

  /** Removes the holding with its positions and history */
  async deleteHolding(userId: string, holdingId: string): Promise<void> {
    const holding = await this.getHolding(userId, holdingId);
    await this.repository.deleteHolding(holding.id);
  }

  /**
   * Adds a contribution; an already held ticker is merged at weighted-average cost.
   */
  async contribute(userId: string, holdingId: string, dto: ContributePositionDto): Promise<Position> {
    const holding = await this.getHolding(userId, holdingId);

    try {
      return await this.ledger.contribute(holding.id, {
        ticker: dto.ticker,
        quantity: toDecimal(dto.quantity),
        unitCost: toDecimal(dto.unitCost),
        assetClass: dto.assetClass,
      });
    } catch (error) {
      // holding deleted between the ownership check and the insert
      if (error instanceof ForeignKeyError) {
        throw new NotFoundException('Holding not found');
      }
      throw error;
    }
  }

  /**
   * @throws NotFoundException if the ticker is not held
   */
  async removePosition(userId: string, holdingId: string, ticker: string): Promise<void> {
    const holding = await this.getHolding(userId, holdingId);
    const position = await this.repository.findPosition(holding.id, ticker.toUpperCase());
    if (!position) {
      throw new NotFoundException(`Position ${ticker.toUpperCase()} not found in this holding`);
    }
    await this.repository.deletePosition(position.id);
  }

  /** Daily snapshots, oldest first */
  async getHistory(userId: string, holdingId: string): Promise<HistorySnapshot[]> {
    const holding = await this.getHolding(userId, holdingId);
    return this.repository.findSnapshots(holding.id);
  }

  private assertOwner<T extends Holding>(userId: string, holding: T | undefined): T {
    if (!holding) {
      throw new NotFoundException('Holding not found');
    }
    if (holding.ownerId !== userId) {
      throw new ForbiddenException('Not authorized to access this holding');
    }
    return holding;
  }

  private duplicateName(name: string): ConflictException {
    return new ConflictException(`Holding named "${name}" already exists`);
  }
}
