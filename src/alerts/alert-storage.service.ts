import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Alert } from './entities/alert.entity';
import { AlertChanges, AlertRepository, NewAlert } from './alert.repository';

// In-memory alert table. Reads return copies.
@Injectable()
export class AlertStorageService extends AlertRepository {
  private alerts: Map<string, Alert> = new Map();

  async create(input: NewAlert): Promise<Alert> {
    const now = new Date();
    const alert: Alert = {
      id: uuidv4(),
      ...input,
      active: true,
      createdAt: now,
      updatedAt: now,
    };
    this.alerts.set(alert.id, alert);
    return { ...alert };
  }

  async findById(id: string): Promise<Alert | undefined> {
    const alert = this.alerts.get(id);
    return alert ? { ...alert } : undefined;
  }

  async findByOwner(ownerId: string): Promise<Alert[]> {
    return this.select((alert) => alert.ownerId === ownerId);
  }

  async update(id: string, changes: AlertChanges): Promise<Alert | undefined> {
    const current = this.alerts.get(id);
    if (!current) {
      return undefined;
    }

    const updated: Alert = {
      ...current,
      ticker: changes.ticker ?? current.ticker,
      targetPrice: changes.targetPrice ?? current.targetPrice,
      direction: changes.direction ?? current.direction,
      active: changes.active ?? current.active,
      updatedAt: new Date(),
    };
    this.alerts.set(id, updated);
    return { ...updated };
  }

  async delete(id: string): Promise<void> {
    this.alerts.delete(id);
  }

  async findAllActive(): Promise<Alert[]> {
    return this.select((alert) => alert.active);
  }

  async findActiveTickers(): Promise<string[]> {
    const tickers = new Set<string>();
    this.alerts.forEach((alert) => {
      if (alert.active) {
        tickers.add(alert.ticker);
      }
    });
    return Array.from(tickers);
  }

  async deactivateMany(ids: string[]): Promise<number> {
    const now = new Date();
    let changed = 0;
    for (const id of ids) {
      const alert = this.alerts.get(id);
      if (alert?.active) {
        this.alerts.set(id, { ...alert, active: false, updatedAt: now });
        changed++;
      }
    }
    return changed;
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.alerts.clear();
  }

  private select(predicate: (alert: Alert) => boolean): Alert[] {
    return Array.from(this.alerts.values())
      .filter(predicate)
      .map((alert) => ({ ...alert }));
  }
}
