import { IsEnum, IsNumber, IsPositive, Length, Matches } from 'class-validator';
import { AlertDirection } from '../entities/alert.entity';

export class CreateAlertDto {
  @Length(1, 20)
  @Matches(/^[A-Z0-9]+$/, { message: 'ticker must be uppercase alphanumeric' })
  ticker!: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  targetPrice!: number;

  @IsEnum(AlertDirection)
  direction!: AlertDirection;
}
