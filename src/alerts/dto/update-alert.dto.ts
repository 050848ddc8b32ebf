import { IsBoolean, IsEnum, IsNumber, IsOptional, IsPositive, Length, Matches } from 'class-validator';
import { AlertDirection } from '../entities/alert.entity';

// Partial update. Setting active=true re-arms a fired alert.
export class UpdateAlertDto {
  @IsOptional()
  @Length(1, 20)
  @Matches(/^[A-Z0-9]+$/, { message: 'ticker must be uppercase alphanumeric' })
  ticker?: string;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  targetPrice?: number;

  @IsOptional()
  @IsEnum(AlertDirection)
  direction?: AlertDirection;

  @IsOptional()
  @IsBoolean()
  active?: boolean;
}
