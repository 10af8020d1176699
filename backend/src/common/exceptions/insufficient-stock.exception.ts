import { ConflictException } from '@nestjs/common';

export interface StockShortfall {
  productId: number;
  productName: string;
  requested: number;
  available: number;
}

export class InsufficientStockException extends ConflictException {
  constructor(readonly shortfall: StockShortfall) {
    super({
      statusCode: 409,
      error: 'Insufficient Stock',
      message: `Seulement ${shortfall.available} articles restants en stock pour ${shortfall.productName}.`,
      produit_id: shortfall.productId,
      demande: shortfall.requested,
      disponible: shortfall.available,
      manque: shortfall.requested - shortfall.available,
    });
  }
}
