import { IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength, Min, ValidateIf } from 'class-validator';

export class CreateProductDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  nom!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  reference!: string;

  @IsNumber()
  @Min(0)
  prix_unitaire!: number;

  @IsInt()
  @Min(0)
  stock_actuel!: number;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  prix_vente?: number;

  @IsOptional()
  @IsInt()
  fournisseur_id?: number;
}

// Édition administrateur : le stock peut être fixé directement
export class UpdateProductDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  nom?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  reference?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  prix_unitaire?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  stock_actuel?: number;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  prix_vente?: number;

  // null détache le produit de son fournisseur
  @ValidateIf((_dto: UpdateProductDto, value: unknown) => value !== null)
  @IsOptional()
  @IsInt()
  fournisseur_id?: number | null;
}
