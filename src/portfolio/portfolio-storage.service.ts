import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Holding, HoldingWithPositions } from './entities/holding.entity';
import { Position } from './entities/position.entity';
import { HistorySnapshot } from './entities/history-snapshot.entity';
import {
  DuplicateKeyError,
  ForeignKeyError,
  HoldingChanges,
  NewHolding,
  NewPosition,
  PortfolioRepository,
  SnapshotValues,
} from './portfolio.repository';

const holdingNameKey = (ownerId: string, name: string): string => `${ownerId}\u0000${name}`;
const positionKey = (holdingId: string, ticker: string): string => `${holdingId}\u0000${ticker}`;
const snapshotKey = (holdingId: string, date: string): string => `${holdingId}\u0000${date}`;

// In-memory storage with unique indexes mirroring the relational constraints.
// Every read returns a copy, so callers never mutate stored rows.
@Injectable()
export class PortfolioStorageService extends PortfolioRepository {
  private holdings: Map<string, Holding> = new Map();
  private holdingNameIndex: Map<string, string> = new Map();

  private positions: Map<string, Position> = new Map();
  private positionIndex: Map<string, string> = new Map();

  private snapshots: Map<string, HistorySnapshot> = new Map();

  async createHolding(input: NewHolding): Promise<Holding> {
    const nameKey = holdingNameKey(input.ownerId, input.name);
    if (this.holdingNameIndex.has(nameKey)) {
      throw new DuplicateKeyError('uq_holding_owner_name');
    }

    const now = new Date();
    const holding: Holding = {
      id: uuidv4(),
      ownerId: input.ownerId,
      name: input.name,
      description: input.description,
      createdAt: now,
      updatedAt: now,
    };
    this.holdings.set(holding.id, holding);
    this.holdingNameIndex.set(nameKey, holding.id);
    return { ...holding };
  }

  async findHoldingById(id: string): Promise<Holding | undefined> {
    const holding = this.holdings.get(id);
    return holding ? { ...holding } : undefined;
  }

  async findHoldingWithPositions(id: string): Promise<HoldingWithPositions | undefined> {
    const holding = this.holdings.get(id);
    return holding ? this.withPositions(holding) : undefined;
  }

  async findHoldingsByOwner(ownerId: string): Promise<Holding[]> {
    return Array.from(this.holdings.values())
      .filter((holding) => holding.ownerId === ownerId)
      .map((holding) => ({ ...holding }));
  }

  async findAllHoldingsWithPositions(): Promise<HoldingWithPositions[]> {
    return Array.from(this.holdings.values()).map((holding) => this.withPositions(holding));
  }

  async updateHolding(id: string, changes: HoldingChanges): Promise<Holding | undefined> {
    const current = this.holdings.get(id);
    if (!current) {
      return undefined;
    }

    const name = changes.name ?? current.name;
    const oldKey = holdingNameKey(current.ownerId, current.name);
    const newKey = holdingNameKey(current.ownerId, name);
    if (newKey !== oldKey && this.holdingNameIndex.has(newKey)) {
      throw new DuplicateKeyError('uq_holding_owner_name');
    }

    const updated: Holding = {
      ...current,
      name,
      description: changes.description ?? current.description,
      updatedAt: new Date(),
    };
    this.holdingNameIndex.delete(oldKey);
    this.holdingNameIndex.set(newKey, id);
    this.holdings.set(id, updated);
    return { ...updated };
  }

  async deleteHolding(id: string): Promise<void> {
    const holding = this.holdings.get(id);
    if (!holding) {
      return;
    }

    for (const position of Array.from(this.positions.values())) {
      if (position.holdingId === id) {
        this.removePosition(position);
      }
    }
    for (const [key, snapshot] of Array.from(this.snapshots.entries())) {
      if (snapshot.holdingId === id) {
        this.snapshots.delete(key);
      }
    }
    this.holdingNameIndex.delete(holdingNameKey(holding.ownerId, holding.name));
    this.holdings.delete(id);
  }

  async findPosition(holdingId: string, ticker: string): Promise<Position | undefined> {
    const id = this.positionIndex.get(positionKey(holdingId, ticker));
    const position = id ? this.positions.get(id) : undefined;
    return position ? { ...position } : undefined;
  }

  async insertPosition(input: NewPosition): Promise<Position> {
    this.assertHoldingExists(input.holdingId, 'fk_position_holding');
    const key = positionKey(input.holdingId, input.ticker);
    if (this.positionIndex.has(key)) {
      throw new DuplicateKeyError('uq_position_holding_ticker');
    }

    const now = new Date();
    const position: Position = {
      id: uuidv4(),
      ...input,
      version: 1,
      createdAt: now,
      updatedAt: now,
    };
    this.positions.set(position.id, position);
    this.positionIndex.set(key, position.id);
    return { ...position };
  }

  async updatePosition(position: Position, expectedVersion: number): Promise<Position | undefined> {
    const stored = this.positions.get(position.id);
    if (!stored || stored.version !== expectedVersion) {
      return undefined;
    }

    const updated: Position = {
      ...stored,
      quantity: position.quantity,
      averageCost: position.averageCost,
      version: stored.version + 1,
      updatedAt: new Date(),
    };
    this.positions.set(updated.id, updated);
    return { ...updated };
  }

  async deletePosition(id: string): Promise<void> {
    const position = this.positions.get(id);
    if (position) {
      this.removePosition(position);
    }
  }

  async findDistinctTickers(): Promise<string[]> {
    const tickers = new Set<string>();
    this.positions.forEach((position) => tickers.add(position.ticker));
    return Array.from(tickers);
  }

  async upsertSnapshot(values: SnapshotValues): Promise<HistorySnapshot> {
    this.assertHoldingExists(values.holdingId, 'fk_snapshot_holding');
    const key = snapshotKey(values.holdingId, values.date);
    const existing = this.snapshots.get(key);
    const now = new Date();

    const snapshot: HistorySnapshot = existing
      ? { ...existing, totalValue: values.totalValue, totalPnlPercent: values.totalPnlPercent, updatedAt: now }
      : { id: uuidv4(), ...values, createdAt: now, updatedAt: now };

    this.snapshots.set(key, snapshot);
    return { ...snapshot };
  }

  async findSnapshots(holdingId: string): Promise<HistorySnapshot[]> {
    return Array.from(this.snapshots.values())
      .filter((snapshot) => snapshot.holdingId === holdingId)
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((snapshot) => ({ ...snapshot }));
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.holdings.clear();
    this.holdingNameIndex.clear();
    this.positions.clear();
    this.positionIndex.clear();
    this.snapshots.clear();
  }

  private assertHoldingExists(holdingId: string, constraint: string): void {
    if (!this.holdings.has(holdingId)) {
      throw new ForeignKeyError(constraint);
    }
  }

  private withPositions(holding: Holding): HoldingWithPositions {
    const positions = Array.from(this.positions.values())
      .filter((position) => position.holdingId === holding.id)
      .map((position) => ({ ...position }));
    return { ...holding, positions };
  }

  private removePosition(position: Position): void {
    this.positions.delete(position.id);
    this.positionIndex.delete(positionKey(position.holdingId, position.ticker));
  }
}
