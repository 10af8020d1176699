import { HttpStatus } from '@nestjs/common';
import { InsufficientStockException } from './insufficient-stock.exception';

describe('InsufficientStockException', () => {
  it('reports what was asked and what is left', () => {
    const error = new InsufficientStockException({
      productId: 4,
      productName: 'Clavier',
      requested: 7,
      available: 2,
    });

    expect(error.getStatus()).toBe(HttpStatus.CONFLICT);
    expect(error.getResponse()).toEqual({
      statusCode: 409,
      error: 'Insufficient Stock',
      message: 'Seulement 2 articles restants en stock pour Clavier.',
      produit_id: 4,
      demande: 7,
      disponible: 2,
      manque: 5,
    });
  });
});
