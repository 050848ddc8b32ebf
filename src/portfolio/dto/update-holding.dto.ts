import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

// All fields optional; omitted fields keep their value.
export class UpdateHoldingDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  description?: string;
}
