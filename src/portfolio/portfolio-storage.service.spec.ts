import Decimal from 'decimal.js';
import { AssetClass } from './entities/position.entity';
import { DuplicateKeyError, ForeignKeyError } from './portfolio.repository';
import { PortfolioStorageService } from './portfolio-storage.service';

describe('PortfolioStorageService', () => {
  let storage: PortfolioStorageService;

  const newPosition = (holdingId: string, ticker: string, quantity = '1', averageCost = '100.00') => ({
    holdingId,
    ticker,
    quantity: new Decimal(quantity),
    averageCost: new Decimal(averageCost),
    assetClass: AssetClass.CRYPTO,
  });

  beforeEach(() => {
    storage = new PortfolioStorageService();
  });

  afterEach(() => {
    storage.clearAllData();
  });

  describe('holdings', () => {
    it('should create and find a holding', async () => {
      const created = await storage.createHolding({ ownerId: 'user-1', name: 'Long term' });

      const found = await storage.findHoldingById(created.id);
      expect(found).toEqual(created);
      expect(found?.ownerId).toBe('user-1');
    });

    it('should reject a duplicate name for the same owner', async () => {
      await storage.createHolding({ ownerId: 'user-1', name: 'Main' });

      await expect(storage.createHolding({ ownerId: 'user-1', name: 'Main' })).rejects.toThrow(DuplicateKeyError);
    });

    it('should allow the same name for different owners', async () => {
      await storage.createHolding({ ownerId: 'user-1', name: 'Main' });
      const other = await storage.createHolding({ ownerId: 'user-2', name: 'Main' });

      expect(other.ownerId).toBe('user-2');
    });

    it('should list only the owner holdings', async () => {
      await storage.createHolding({ ownerId: 'user-1', name: 'A' });
      await storage.createHolding({ ownerId: 'user-1', name: 'B' });
      await storage.createHolding({ ownerId: 'user-2', name: 'C' });

      const holdings = await storage.findHoldingsByOwner('user-1');
      expect(holdings.map((h) => h.name).sort()).toEqual(['A', 'B']);
    });

    it('should rename and free the old name', async () => {
      const holding = await storage.createHolding({ ownerId: 'user-1', name: 'Old' });

      const updated = await storage.updateHolding(holding.id, { name: 'New', description: 'desc' });
      expect(updated?.name).toBe('New');
      expect(updated?.description).toBe('desc');

      const reused = await storage.createHolding({ ownerId: 'user-1', name: 'Old' });
      expect(reused.name).toBe('Old');
    });

    it('should reject renaming onto an existing name', async () => {
      await storage.createHolding({ ownerId: 'user-1', name: 'Taken' });
      const holding = await storage.createHolding({ ownerId: 'user-1', name: 'Mine' });

      await expect(storage.updateHolding(holding.id, { name: 'Taken' })).rejects.toThrow(DuplicateKeyError);
    });

    it('should return undefined when updating a missing holding', async () => {
      expect(await storage.updateHolding('missing', { name: 'x' })).toBeUndefined();
    });

    it('should cascade delete to positions and snapshots', async () => {
      const holding = await storage.createHolding({ ownerId: 'user-1', name: 'Doomed' });
      const kept = await storage.createHolding({ ownerId: 'user-1', name: 'Kept' });
      await storage.insertPosition(newPosition(holding.id, 'BTC'));
      await storage.insertPosition(newPosition(kept.id, 'ETH'));
      await storage.upsertSnapshot({
        holdingId: holding.id,
        date: '2024-05-01',
        totalValue: new Decimal(10),
        totalPnlPercent: new Decimal(0),
      });

      await storage.deleteHolding(holding.id);

      expect(await storage.findHoldingById(holding.id)).toBeUndefined();
      expect(await storage.findPosition(holding.id, 'BTC')).toBeUndefined();
      expect(await storage.findSnapshots(holding.id)).toEqual([]);
      expect(await storage.findDistinctTickers()).toEqual(['ETH']);
    });

    it('should load positions only in the eager fetch shape', async () => {
      const holding = await storage.createHolding({ ownerId: 'user-1', name: 'Eager' });
      await storage.insertPosition(newPosition(holding.id, 'BTC'));

      const light = await storage.findHoldingById(holding.id);
      const eager = await storage.findHoldingWithPositions(holding.id);

      expect(light).not.toHaveProperty('positions');
      expect(eager?.positions.map((p) => p.ticker)).toEqual(['BTC']);
    });
  });

  describe('positions', () => {
    let holdingId: string;

    beforeEach(async () => {
      holdingId = (await storage.createHolding({ ownerId: 'user-1', name: 'P' })).id;
    });

    it('should insert with version 1', async () => {
      const position = await storage.insertPosition(newPosition(holdingId, 'BTC'));

      expect(position.version).toBe(1);
      expect(position.ticker).toBe('BTC');
    });

    it('should reject a second row for the same ticker', async () => {
      await storage.insertPosition(newPosition(holdingId, 'BTC'));

      await expect(storage.insertPosition(newPosition(holdingId, 'BTC'))).rejects.toThrow(DuplicateKeyError);
    });

    it('should reject a position for a holding that no longer exists', async () => {
      await storage.deleteHolding(holdingId);

      await expect(storage.insertPosition(newPosition(holdingId, 'BTC'))).rejects.toThrow(ForeignKeyError);
      expect(await storage.findDistinctTickers()).toEqual([]);
    });

    it('should update when the version matches and bump it', async () => {
      const position = await storage.insertPosition(newPosition(holdingId, 'BTC'));

      const updated = await storage.updatePosition(
        { ...position, quantity: new Decimal(2), averageCost: new Decimal('150.00') },
        1,
      );

      expect(updated?.version).toBe(2);
      expect(updated?.quantity.toString()).toBe('2');
      expect(updated?.averageCost.toString()).toBe('150');
    });

    it('should refuse a stale version', async () => {
      const position = await storage.insertPosition(newPosition(holdingId, 'BTC'));
      await storage.updatePosition({ ...position, quantity: new Decimal(2) }, 1);

      const stale = await storage.updatePosition({ ...position, quantity: new Decimal(5) }, 1);

      expect(stale).toBeUndefined();
      expect((await storage.findPosition(holdingId, 'BTC'))?.quantity.toString()).toBe('2');
    });

    it('should hand out copies', async () => {
      await storage.insertPosition(newPosition(holdingId, 'BTC'));
      const copy = await storage.findPosition(holdingId, 'BTC');
      if (!copy) {
        throw new Error('expected position');
      }

      copy.quantity = new Decimal(999);

      expect((await storage.findPosition(holdingId, 'BTC'))?.quantity.toString()).toBe('1');
    });

    it('should delete one position without touching the others', async () => {
      const btc = await storage.insertPosition(newPosition(holdingId, 'BTC'));
      await storage.insertPosition(newPosition(holdingId, 'ETH'));

      await storage.deletePosition(btc.id);

      const holding = await storage.findHoldingWithPositions(holdingId);
      expect(holding?.positions.map((p) => p.ticker)).toEqual(['ETH']);
    });

    it('should list distinct tickers across holdings', async () => {
      const other = await storage.createHolding({ ownerId: 'user-2', name: 'Q' });
      await storage.insertPosition(newPosition(holdingId, 'BTC'));
      await storage.insertPosition(newPosition(holdingId, 'ETH'));
      await storage.insertPosition(newPosition(other.id, 'BTC'));

      const tickers = await storage.findDistinctTickers();
      expect(tickers.sort()).toEqual(['BTC', 'ETH']);
    });
  });

  describe('snapshots', () => {
    let holdingId: string;

    beforeEach(async () => {
      holdingId = (await storage.createHolding({ ownerId: 'user-1', name: 'S' })).id;
    });

    it('should keep one row per holding and date with the last write winning', async () => {
      const first = await storage.upsertSnapshot({
        holdingId,
        date: '2024-05-01',
        totalValue: new Decimal('1000.00'),
        totalPnlPercent: new Decimal('10.0'),
      });
      const second = await storage.upsertSnapshot({
        holdingId,
        date: '2024-05-01',
        totalValue: new Decimal('2500.00'),
        totalPnlPercent: new Decimal('25.0'),
      });

      const rows = await storage.findSnapshots(holdingId);
      expect(rows).toHaveLength(1);
      expect(second.id).toBe(first.id);
      expect(rows[0].totalValue.toNumber()).toBe(2500);
      expect(rows[0].totalPnlPercent.toNumber()).toBe(25);
    });

    it('should return snapshots oldest first', async () => {
      for (const date of ['2024-05-03', '2024-05-01', '2024-05-02']) {
        await storage.upsertSnapshot({
          holdingId,
          date,
          totalValue: new Decimal(1),
          totalPnlPercent: new Decimal(0),
        });
      }

      const rows = await storage.findSnapshots(holdingId);
      expect(rows.map((row) => row.date)).toEqual(['2024-05-01', '2024-05-02', '2024-05-03']);
    });

    it('should reject a snapshot for a holding that no longer exists', async () => {
      await storage.deleteHolding(holdingId);

      await expect(
        storage.upsertSnapshot({
          holdingId,
          date: '2024-05-01',
          totalValue: new Decimal(1),
          totalPnlPercent: new Decimal(0),
        }),
      ).rejects.toThrow(ForeignKeyError);
      expect(await storage.findSnapshots(holdingId)).toEqual([]);
    });
  });
});
