import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsDateString,
  IsEnum,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { OrderStatus } from '../../entities/order.entity';

export class OrderLineDto {
  @IsInt()
  produit_id!: number;

  @IsInt()
  @Min(1)
  quantite!: number;

  @IsNumber()
  @Min(0)
  prix_achat!: number;
}

export class CreateOrderDto {
  @IsInt()
  fournisseur_id!: number;

  @IsString()
  @MaxLength(255)
  societe!: string;

  // Une commande ne peut pas être créée déjà annulée
  @IsOptional()
  @IsIn([OrderStatus.PENDING, OrderStatus.CONFIRMED, OrderStatus.RECEIVED])
  statut?: OrderStatus;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => OrderLineDto)
  details!: OrderLineDto[];
}

export class UpdateOrderDto {
  @IsOptional()
  @IsEnum(OrderStatus)
  statut?: OrderStatus;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  societe?: string;

  @IsOptional()
  @IsDateString()
  date_commande?: string;

  // Le total n'est jamais recalculé : l'appelant le fixe explicitement
  @IsOptional()
  @IsNumber()
  @Min(0)
  cout_total?: number;
}
