import { ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { PriceService } from '../market-data/price.service';
import { AssetClass } from './entities/position.entity';
import { ContributePositionDto } from './dto/contribute-position.dto';
import { PortfolioRepository } from './portfolio.repository';
import { PortfolioStorageService } from './portfolio-storage.service';
import { PortfolioService } from './portfolio.service';
import { PositionLedgerService } from './position-ledger.service';
import { ValuationService } from './valuation.service';

describe('PortfolioService', () => {
  let service: PortfolioService;
  let storage: PortfolioStorageService;
  let getPrice: jest.Mock<Promise<Decimal | undefined>, [string, boolean?]>;

  const OWNER = 'user-1';
  const STRANGER = 'user-2';

  const contributeDto = (overrides: Partial<ContributePositionDto> = {}): ContributePositionDto => ({
    ticker: 'BTC',
    quantity: 1,
    unitCost: 20000,
    assetClass: AssetClass.CRYPTO,
    ...overrides,
  });

  beforeEach(async () => {
    getPrice = jest.fn();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PortfolioStorageService,
        { provide: PortfolioRepository, useExisting: PortfolioStorageService },
        { provide: PriceService, useValue: { getPrice } },
        PositionLedgerService,
        ValuationService,
        PortfolioService,
      ],
    }).compile();

    service = module.get<PortfolioService>(PortfolioService);
    storage = module.get<PortfolioStorageService>(PortfolioStorageService);
  });

  afterEach(() => {
    storage.clearAllData();
  });

  describe('createHolding', () => {
    it('should create a holding for the user', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Crypto', description: 'coins' });

      expect(holding.ownerId).toBe(OWNER);
      expect(holding.name).toBe('Crypto');
      expect(holding.description).toBe('coins');
    });

    it('should reject a duplicate name for the same user', async () => {
      await service.createHolding(OWNER, { name: 'Crypto' });

      await expect(service.createHolding(OWNER, { name: 'Crypto' })).rejects.toThrow(ConflictException);
    });

    it('should map a storage uniqueness violation to a conflict', async () => {
      await storage.createHolding({ ownerId: OWNER, name: 'Raced' });
      jest.spyOn(storage, 'findHoldingsByOwner').mockResolvedValueOnce([]);

      await expect(service.createHolding(OWNER, { name: 'Raced' })).rejects.toThrow(ConflictException);
    });

    it('should allow the same name for another user', async () => {
      await service.createHolding(OWNER, { name: 'Crypto' });

      const other = await service.createHolding(STRANGER, { name: 'Crypto' });
      expect(other.ownerId).toBe(STRANGER);
    });
  });

  describe('getHolding', () => {
    it('should throw NotFoundException for an unknown id', async () => {
      await expect(service.getHolding(OWNER, 'missing')).rejects.toThrow(NotFoundException);
    });

    it("should throw ForbiddenException for someone else's holding", async () => {
      const holding = await service.createHolding(STRANGER, { name: 'Theirs' });

      await expect(service.getHolding(OWNER, holding.id)).rejects.toThrow(ForbiddenException);
    });
  });

  describe('getValuatedHolding', () => {
    it('should price the positions', async () => {
      getPrice.mockResolvedValue(new Decimal(50000));
      const holding = await service.createHolding(OWNER, { name: 'Main' });
      await service.contribute(OWNER, holding.id, contributeDto());

      const result = await service.getValuatedHolding(OWNER, holding.id);

      expect(getPrice).toHaveBeenCalledWith('BTC');
      expect(result.totalValue.toNumber()).toBe(50000);
      expect(result.totalPnlPercent?.toNumber()).toBe(150);
    });

    it('should check ownership before pricing', async () => {
      const holding = await service.createHolding(STRANGER, { name: 'Theirs' });

      await expect(service.getValuatedHolding(OWNER, holding.id)).rejects.toThrow(ForbiddenException);
      expect(getPrice).not.toHaveBeenCalled();
    });
  });

  describe('updateHolding', () => {
    it('should rename a holding', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Old' });

      const updated = await service.updateHolding(OWNER, holding.id, { name: 'New' });

      expect(updated.name).toBe('New');
    });

    it('should keep the description when it is omitted', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Keep', description: 'original' });

      const updated = await service.updateHolding(OWNER, holding.id, { name: 'Kept' });

      expect(updated.description).toBe('original');
    });

    it('should reject renaming onto another holding name', async () => {
      await service.createHolding(OWNER, { name: 'Taken' });
      const holding = await service.createHolding(OWNER, { name: 'Mine' });

      await expect(service.updateHolding(OWNER, holding.id, { name: 'Taken' })).rejects.toThrow(ConflictException);
    });

    it('should accept renaming to the current name', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Same' });

      const updated = await service.updateHolding(OWNER, holding.id, { name: 'Same', description: 'now described' });

      expect(updated.description).toBe('now described');
    });
  });

  describe('deleteHolding', () => {
    it('should delete the holding with its positions', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Gone' });
      await service.contribute(OWNER, holding.id, contributeDto());

      await service.deleteHolding(OWNER, holding.id);

      expect(await storage.findHoldingById(holding.id)).toBeUndefined();
      expect(await storage.findDistinctTickers()).toEqual([]);
    });

    it("should refuse to delete someone else's holding", async () => {
      const holding = await service.createHolding(STRANGER, { name: 'Theirs' });

      await expect(service.deleteHolding(OWNER, holding.id)).rejects.toThrow(ForbiddenException);
      expect(await storage.findHoldingById(holding.id)).toBeDefined();
    });
  });

  describe('contribute', () => {
    it('should merge a second contribution at weighted-average cost', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Main' });
      await service.contribute(OWNER, holding.id, contributeDto({ quantity: 1, unitCost: 20000 }));

      const position = await service.contribute(OWNER, holding.id, contributeDto({ quantity: 1, unitCost: 40000 }));

      expect(position.quantity.toNumber()).toBe(2);
      expect(position.averageCost.toNumber()).toBe(30000);
    });

    it('should reject contributions to a missing holding', async () => {
      await expect(service.contribute(OWNER, 'missing', contributeDto())).rejects.toThrow(NotFoundException);
    });

    it("should reject contributions to someone else's holding", async () => {
      const holding = await service.createHolding(STRANGER, { name: 'Theirs' });

      await expect(service.contribute(OWNER, holding.id, contributeDto())).rejects.toThrow(ForbiddenException);
      expect(await storage.findPosition(holding.id, 'BTC')).toBeUndefined();
    });

    it('should report NotFound when the holding is deleted before the position is written', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Short lived' });
      jest.spyOn(storage, 'findPosition').mockImplementationOnce(async () => {
        await storage.deleteHolding(holding.id);
        return undefined;
      });

      await expect(service.contribute(OWNER, holding.id, contributeDto())).rejects.toThrow(NotFoundException);
      expect(await storage.findDistinctTickers()).toEqual([]);
    });
  });

  describe('removePosition', () => {
    it('should remove only the named ticker', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Main' });
      await service.contribute(OWNER, holding.id, contributeDto({ ticker: 'BTC' }));
      await service.contribute(OWNER, holding.id, contributeDto({ ticker: 'ETH', unitCost: 2500 }));

      await service.removePosition(OWNER, holding.id, 'btc');

      const loaded = await storage.findHoldingWithPositions(holding.id);
      expect(loaded?.positions.map((p) => p.ticker)).toEqual(['ETH']);
    });

    it('should throw NotFoundException for a ticker not held', async () => {
      const holding = await service.createHolding(OWNER, { name: 'Main' });

      await expect(service.removePosition(OWNER, holding.id, 'SOL')).rejects.toThrow(NotFoundException);
    });
  });

  describe('getHistory', () => {
    it('should return the holding snapshots', async () => {
      const holding = await service.createHolding(OWNER, { name: 'History' });
      await storage.upsertSnapshot({
        holdingId: holding.id,
        date: '2024-05-01',
        totalValue: new Decimal('5000.00'),
        totalPnlPercent: new Decimal('15.50'),
      });

      const history = await service.getHistory(OWNER, holding.id);

      expect(history).toHaveLength(1);
      expect(history[0].totalValue.toNumber()).toBe(5000);
      expect(history[0].totalPnlPercent.toNumber()).toBe(15.5);
    });

    it("should refuse someone else's history", async () => {
      const holding = await service.createHolding(STRANGER, { name: 'Theirs' });

      await expect(service.getHistory(OWNER, holding.id)).rejects.toThrow(ForbiddenException);
    });
  });
});
