import { Order, OrderStatus, OrderType } from '../entities/order.entity';
import { OrderLine } from '../entities/order-line.entity';
import { toOrderResponse } from './order.transform';

function buildLine(id: number, productId: number | null, productName: string, quantity: number, unitPrice: number) {
  return Object.assign(new OrderLine(), { id, orderId: 1, productId, productName, quantity, unitPrice });
}

describe('toOrderResponse', () => {
  it('maps an order and sorts its lines by id', () => {
    const order = Object.assign(new Order(), {
      id: 1,
      supplierId: 3,
      company: 'Société Test',
      orderDate: new Date('2026-03-02T08:30:00.000Z'),
      status: OrderStatus.CONFIRMED,
      orderType: OrderType.RESTOCK,
      totalCost: 1550,
      lines: [
        buildLine(8, null, 'Souris sans fil', 2, 25),
        buildLine(5, 4, 'Ordinateur portable', 3, 500),
      ],
    });

    expect(toOrderResponse(order)).toEqual({
      id: 1,
      fournisseur_id: 3,
      societe: 'Société Test',
      date_commande: '2026-03-02T08:30:00.000Z',
      statut: 'CONFIRMED',
      type: 'RESTOCK',
      cout_total: 1550,
      details: [
        { id: 5, produit_id: 4, nom_produit: 'Ordinateur portable', quantite: 3, prix_achat: 500 },
        { id: 8, produit_id: null, nom_produit: 'Souris sans fil', quantite: 2, prix_achat: 25 },
      ],
    });
  });
});
