import { IsInt, IsNotEmpty, IsString, MaxLength, Min } from 'class-validator';

export class AddCartItemDto {
  @IsInt()
  produit_id!: number;

  @IsInt()
  @Min(1)
  quantite!: number;
}

export class FinalizeCartDto {
  @IsInt()
  fournisseur_id!: number;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  societe!: string;
}
