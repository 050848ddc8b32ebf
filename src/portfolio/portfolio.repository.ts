import Decimal from 'decimal.js';
import { Holding, HoldingWithPositions } from './entities/holding.entity';
import { AssetClass, Position } from './entities/position.entity';
import { HistorySnapshot } from './entities/history-snapshot.entity';

/** Raised by storage when an insert violates a uniqueness constraint. */
export class DuplicateKeyError extends Error {
  constructor(readonly constraint: string) {
    super(`Duplicate key violates unique constraint "${constraint}"`);
    this.name = 'DuplicateKeyError';
  }
}

/** Raised by storage when a row references a holding that no longer exists. */
export class ForeignKeyError extends Error {
  constructor(readonly constraint: string) {
    super(`Insert violates foreign key constraint "${constraint}"`);
    this.name = 'ForeignKeyError';
  }
}

export interface NewHolding {
  ownerId: string;
  name: string;
  description?: string;
}

export interface HoldingChanges {
  name?: string;
  description?: string;
}

export interface NewPosition {
  holdingId: string;
  ticker: string;
  quantity: Decimal;
  averageCost: Decimal;
  assetClass: AssetClass;
}

export interface SnapshotValues {
  holdingId: string;
  date: string;
  totalValue: Decimal;
  totalPnlPercent: Decimal;
}

/**
 * Storage collaborator for holdings, positions and history snapshots.
 * Methods name their fetch shape; nothing is loaded lazily.
 */
export abstract class PortfolioRepository {
  /** @throws DuplicateKeyError when the owner already has a holding with this name */
  abstract createHolding(holding: NewHolding): Promise<Holding>;

  /** Lightweight: positions excluded */
  abstract findHoldingById(id: string): Promise<Holding | undefined>;

  abstract findHoldingWithPositions(id: string): Promise<HoldingWithPositions | undefined>;

  abstract findHoldingsByOwner(ownerId: string): Promise<Holding[]>;

  /** Every holding in the system with positions loaded */
  abstract findAllHoldingsWithPositions(): Promise<HoldingWithPositions[]>;

  /** @throws DuplicateKeyError when renaming onto another holding's name */
  abstract updateHolding(id: string, changes: HoldingChanges): Promise<Holding | undefined>;

  /** Cascades to the holding's positions and snapshots */
  abstract deleteHolding(id: string): Promise<void>;

  abstract findPosition(holdingId: string, ticker: string): Promise<Position | undefined>;

  /**
   * @throws DuplicateKeyError when the ticker is already held
   * @throws ForeignKeyError when the holding is gone
   */
  abstract insertPosition(position: NewPosition): Promise<Position>;

  /**
   * Compare-and-swap update of quantity and average cost.
   * Resolves undefined when the stored version no longer matches expectedVersion.
   */
  abstract updatePosition(position: Position, expectedVersion: number): Promise<Position | undefined>;

  abstract deletePosition(id: string): Promise<void>;

  abstract findDistinctTickers(): Promise<string[]>;

  /**
   * Insert, or overwrite the values of the existing (holdingId, date) row.
   * @throws ForeignKeyError when the holding is gone
   */
  abstract upsertSnapshot(values: SnapshotValues): Promise<HistorySnapshot>;

  /** Oldest first */
  abstract findSnapshots(holdingId: string): Promise<HistorySnapshot[]>;
}
