import { IsDateString, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export class CreateChargeDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  nature!: string;

  @IsNumber()
  @Min(1)
  montant!: number;

  // YYYY-MM-DD, aujourd'hui par défaut
  @IsOptional()
  @IsDateString()
  date?: string;
}

export class UpdateChargeDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  nature?: string;

  @IsOptional()
  @IsNumber()
  @Min(1)
  montant?: number;

  @IsOptional()
  @IsDateString()
  date?: string;
}
