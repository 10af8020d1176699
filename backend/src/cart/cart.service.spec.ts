import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { CartService } from './cart.service';
import { CartSession } from './cart-session';
import { ProductsService } from '../products/products.service';
import { OrdersService } from '../orders/orders.service';
import { AuditService } from '../audit/audit.service';
import { InsufficientStockException } from '../common/exceptions/insufficient-stock.exception';

describe('CartService', () => {
  const manager = { name: 'transaction-manager' };
  const productsService = {
    reserveStock: jest.fn(),
    incrementStock: jest.fn(),
  };
  const ordersService = {
    createFromCart: jest.fn(),
  };
  const auditService = {
    log: jest.fn(),
  };
  const dataSource = {
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) => work(manager)),
  };
  let service: CartService;

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        CartService,
        { provide: DataSource, useValue: dataSource },
        { provide: ProductsService, useValue: productsService },
        { provide: OrdersService, useValue: ordersService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();
    service = moduleRef.get(CartService);
  });

  it('adds the reserved product with its current name and price', async () => {
    productsService.reserveStock.mockResolvedValue({ id: 1, name: 'Clavier', unitPrice: 75, stock: 17 });
    const session = new CartSession('user-1');

    const entry = await service.addItem(session, { produit_id: 1, quantite: 3 });

    expect(productsService.reserveStock).toHaveBeenCalledWith(1, 3);
    expect(entry).toEqual({ productId: 1, productName: 'Clavier', unitPrice: 75, quantity: 3 });
  });

  it('leaves the cart untouched when the reservation fails', async () => {
    productsService.reserveStock.mockRejectedValue(new InsufficientStockException({
      productId: 1,
      productName: 'Clavier',
      requested: 30,
      available: 20,
    }));
    const session = new CartSession('user-1');

    await expect(service.addItem(session, { produit_id: 1, quantite: 30 })).rejects.toBeInstanceOf(
      InsufficientStockException,
    );
    expect(session.isEmpty).toBe(true);
  });

  it('keeps the line when restoring its stock fails', async () => {
    productsService.incrementStock.mockRejectedValue(new Error('database unavailable'));
    const session = new CartSession('user-1');
    session.add({ productId: 1, productName: 'Clavier', unitPrice: 75 }, 2);

    await expect(service.removeItem(session, 1)).rejects.toThrow('database unavailable');
    expect(session.find(1)?.quantity).toBe(2);
  });

  it('refuses to remove a product that is not in the cart', async () => {
    await expect(service.removeItem(new CartSession('user-1'), 1)).rejects.toBeInstanceOf(NotFoundException);
    expect(productsService.incrementStock).not.toHaveBeenCalled();
  });

  it('restores every line in one transaction and still clears lines whose product is gone', async () => {
    productsService.incrementStock.mockResolvedValueOnce(true).mockResolvedValueOnce(false);
    const session = new CartSession('user-1');
    session.add({ productId: 1, productName: 'Clavier', unitPrice: 75 }, 2);
    session.add({ productId: 2, productName: 'Souris', unitPrice: 25 }, 5);

    const result = await service.clearCart(session);

    expect(dataSource.transaction).toHaveBeenCalledTimes(1);
    expect(productsService.incrementStock).toHaveBeenNthCalledWith(1, 1, 2, manager);
    expect(productsService.incrementStock).toHaveBeenNthCalledWith(2, 2, 5, manager);
    expect(result).toEqual({ message: 'Le panier a été vidé et le stock restauré', restored: 2 });
    expect(session.isEmpty).toBe(true);
  });

  it('refuses to finalize an empty cart', async () => {
    await expect(
      service.finalize(new CartSession('user-1'), { fournisseur_id: 1, societe: 'Société Test' }),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(ordersService.createFromCart).not.toHaveBeenCalled();
  });

  it('keeps the cart when the order cannot be saved', async () => {
    ordersService.createFromCart.mockRejectedValue(new NotFoundException('Fournisseur 9 non trouvé'));
    const session = new CartSession('user-1');
    session.add({ productId: 1, productName: 'Clavier', unitPrice: 75 }, 2);

    await expect(service.finalize(session, { fournisseur_id: 9, societe: 'Société Test' })).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(session.isEmpty).toBe(false);
  });

  it('passes the cart lines to the order and empties the cart', async () => {
    ordersService.createFromCart.mockResolvedValue({ id: 12, totalCost: 150, lines: [{ id: 1 }] });
    const session = new CartSession('user-1');
    session.add({ productId: 1, productName: 'Clavier', unitPrice: 75 }, 2);

    const order = await service.finalize(session, { fournisseur_id: 3, societe: 'Société Test' });

    expect(order.id).toBe(12);
    expect(ordersService.createFromCart).toHaveBeenCalledWith(
      [{ productId: 1, productName: 'Clavier', unitPrice: 75, quantity: 2 }],
      { supplierId: 3, company: 'Société Test', createdByUserId: 'user-1' },
    );
    expect(session.isEmpty).toBe(true);
    expect(auditService.log).toHaveBeenCalledWith('user-1', 'FINALIZE_CART', 'Order', 12, {
      totalCost: 150,
      lines: 1,
    });
  });
});
