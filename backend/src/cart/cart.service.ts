import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { ProductsService } from '../products/products.service';
import { OrdersService } from '../orders/orders.service';
import { AuditService } from '../audit/audit.service';
import { Order } from '../entities/order.entity';
import { CartEntry, CartSession } from './cart-session';
import { AddCartItemDto, FinalizeCartDto } from './dto/cart.dto';

@Injectable()
export class CartService {
  private readonly logger = new Logger(CartService.name);

  constructor(
    private dataSource: DataSource,
    private productsService: ProductsService,
    private ordersService: OrdersService,
    private auditService: AuditService,
  ) {}

  // Le stock est déduit immédiatement pour éviter les surventes
  async addItem(session: CartSession, dto: AddCartItemDto): Promise<CartEntry> {
    const product = await this.productsService.reserveStock(dto.produit_id, dto.quantite);

    return session.add(
      {
        productId: product.id,
        productName: product.name,
        unitPrice: Number(product.unitPrice),
      },
      dto.quantite,
    );
  }

  async removeItem(session: CartSession, productId: number): Promise<void> {
    const entry = session.find(productId);
    if (!entry) {
      throw new NotFoundException('Article non trouvé dans le panier');
    }

    await this.productsService.incrementStock(entry.productId, entry.quantity);
    session.remove(productId);
  }

  // Restitue tout le stock réservé en une transaction, puis vide le panier
  async clearCart(session: CartSession): Promise<{ message: string; restored: number }> {
    const lines = session.lines();
    if (lines.length === 0) {
      return { message: 'Le panier est déjà vide', restored: 0 };
    }

    await this.dataSource.transaction(async (manager) => {
      for (const line of lines) {
        const restored = await this.productsService.incrementStock(line.productId, line.quantity, manager);
        if (!restored) {
          this.logger.warn(`Product ${line.productId} no longer exists, ${line.quantity} reserved unit(s) dropped`);
        }
      }
    });
    session.clear();

    return { message: 'Le panier a été vidé et le stock restauré', restored: lines.length };
  }

  /**
   * Persists the cart as one CART order. Stock was reserved when each line
   * was added, so nothing is decremented here; on success the cart is
   * emptied without restoring.
   */
  async finalize(session: CartSession, dto: FinalizeCartDto): Promise<Order> {
    if (session.isEmpty) {
      throw new BadRequestException('Le panier est vide. Veuillez ajouter des produits avant de finaliser l\'achat.');
    }

    const order = await this.ordersService.createFromCart(session.lines(), {
      supplierId: dto.fournisseur_id,
      company: dto.societe,
      createdByUserId: session.userId,
    });
    session.clear();

    await this.auditService.log(session.userId, 'FINALIZE_CART', 'Order', order.id, {
      totalCost: order.totalCost,
      lines: order.lines.length,
    });

    return order;
  }
}
