import Decimal from 'decimal.js';
import { Alert, AlertDirection } from './entities/alert.entity';

export interface NewAlert {
  ownerId: string;
  ticker: string;
  targetPrice: Decimal;
  direction: AlertDirection;
}

export interface AlertChanges {
  ticker?: string;
  targetPrice?: Decimal;
  direction?: AlertDirection;
  active?: boolean;
}

export abstract class AlertRepository {
  abstract create(alert: NewAlert): Promise<Alert>;

  abstract findById(id: string): Promise<Alert | undefined>;

  abstract findByOwner(ownerId: string): Promise<Alert[]>;

  abstract update(id: string, changes: AlertChanges): Promise<Alert | undefined>;

  abstract delete(id: string): Promise<void>;

  abstract findAllActive(): Promise<Alert[]>;

  abstract findActiveTickers(): Promise<string[]>;

  /** Marks every given alert inactive in one write */
  abstract deactivateMany(ids: string[]): Promise<number>;
}
