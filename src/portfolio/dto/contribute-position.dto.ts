import { IsEnum, IsNumber, IsPositive, Length, Matches } from 'class-validator';
import { AssetClass } from '../entities/position.entity';

// Adds quantity to a holding. An already held ticker is merged at weighted-average cost.
export class ContributePositionDto {
  @Length(1, 20)
  @Matches(/^[A-Z0-9]+$/, { message: 'ticker must be uppercase alphanumeric' })
  ticker!: string;

  @IsNumber({ maxDecimalPlaces: 8 })
  @IsPositive()
  quantity!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  unitCost!: number;

  @IsEnum(AssetClass)
  assetClass!: AssetClass;
}
