import { AlertDirection } from '../entities/alert.entity';

export interface AlertResponseDto {
  id: string;
  ownerId: string;
  ticker: string;
  targetPrice: number;
  direction: AlertDirection;
  active: boolean;
  createdAt: string;
}
