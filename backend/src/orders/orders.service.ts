import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { Order, OrderStatus, OrderType } from '../entities/order.entity';
import { UserRole } from '../entities/user.entity';
import { AuthenticatedUser } from '../auth/authenticated-user';
import { OrderLine } from '../entities/order-line.entity';
import { ProductsService } from '../products/products.service';
import { SuppliersService } from '../suppliers/suppliers.service';
import { AuditService } from '../audit/audit.service';
import { roundAmount, sumLineTotals } from '../common/money';
import { CreateOrderDto, UpdateOrderDto } from './dto/order.dto';

// Labels des statuts pour les messages
export const ORDER_STATUS_LABELS: Record<OrderStatus, string> = {
  [OrderStatus.PENDING]: 'En attente',
  [OrderStatus.CONFIRMED]: 'Confirmée',
  [OrderStatus.RECEIVED]: 'Reçue',
  [OrderStatus.CANCELLED]: 'Annulée',
};

export const ORDER_STATUS_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  [OrderStatus.PENDING]: [OrderStatus.CONFIRMED, OrderStatus.RECEIVED, OrderStatus.CANCELLED],
  [OrderStatus.CONFIRMED]: [OrderStatus.RECEIVED, OrderStatus.CANCELLED],
  [OrderStatus.RECEIVED]: [],
  [OrderStatus.CANCELLED]: [],
};

export interface NewOrderLine {
  productId: number;
  productName?: string;
  quantity: number;
  unitPrice: number;
}

export interface NewOrderHeader {
  supplierId: number;
  company: string;
  createdByUserId: string | null;
  status?: OrderStatus;
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectRepository(Order)
    private orderRepository: Repository<Order>,
    private dataSource: DataSource,
    private productsService: ProductsService,
    private suppliersService: SuppliersService,
    private auditService: AuditService,
  ) {}

  // Un client ne voit et ne modifie que ses propres commandes
  private visibleTo(requester: AuthenticatedUser | undefined): FindOptionsWhere<Order> {
    if (!requester || requester.role === UserRole.ADMIN) {
      return {};
    }
    return { createdByUserId: requester.id };
  }

  async findAll(requester?: AuthenticatedUser): Promise<Order[]> {
    return this.orderRepository.find({
      where: this.visibleTo(requester),
      relations: { lines: true },
      order: { orderDate: 'DESC', id: 'DESC' },
    });
  }

  // Orders outside the requester's scope answer 404 like missing ones
  async findOne(id: number, requester?: AuthenticatedUser, manager?: EntityManager): Promise<Order> {
    const repository = manager ? manager.getRepository(Order) : this.orderRepository;
    const order = await repository.findOne({
      where: { id, ...this.visibleTo(requester) },
      relations: { lines: true },
    });

    if (!order) {
      throw new NotFoundException(`Commande ${id} non trouvée`);
    }

    return order;
  }

  /**
   * Purchase order recorded directly (restocking): every referenced
   * product's stock grows by the line quantity, in the same transaction
   * as the order rows.
   */
  async create(dto: CreateOrderDto, currentUserId: string): Promise<Order> {
    const lines: NewOrderLine[] = dto.details.map((detail) => ({
      productId: detail.produit_id,
      quantity: detail.quantite,
      unitPrice: detail.prix_achat,
    }));

    const order = await this.dataSource.transaction(async (manager) => {
      const saved = await this.persistOrder(manager, OrderType.RESTOCK, lines, {
        supplierId: dto.fournisseur_id,
        company: dto.societe,
        createdByUserId: currentUserId,
        status: dto.statut,
      });

      // Augmentation du stock pour un achat
      for (const line of lines) {
        await this.productsService.incrementStock(line.productId, line.quantity, manager);
      }

      return saved;
    });

    await this.auditService.log(currentUserId, 'CREATE_ORDER', 'Order', order.id, {
      orderType: order.orderType,
      totalCost: order.totalCost,
    });

    return order;
  }

  // Stock already reserved line by line by the cart: no stock change here
  async createFromCart(lines: NewOrderLine[], header: NewOrderHeader): Promise<Order> {
    return this.dataSource.transaction((manager) =>
      this.persistOrder(manager, OrderType.CART, lines, { ...header, status: OrderStatus.PENDING }),
    );
  }

  async update(id: number, dto: UpdateOrderDto, requester: AuthenticatedUser): Promise<Order> {
    const oldStatus = await this.dataSource.transaction(async (manager) => {
      const order = await this.findOne(id, requester, manager);
      const previous = order.status;

      if (dto.statut !== undefined && dto.statut !== order.status) {
        if (!ORDER_STATUS_TRANSITIONS[order.status].includes(dto.statut)) {
          throw new BadRequestException(
            `Transition de statut invalide : "${ORDER_STATUS_LABELS[order.status]}" vers "${ORDER_STATUS_LABELS[dto.statut]}"`,
          );
        }
        if (dto.statut === OrderStatus.CANCELLED) {
          await this.reverseStockEffect(manager, order);
        }
      }

      await manager.update(Order, { id }, {
        status: dto.statut ?? order.status,
        company: dto.societe ?? order.company,
        orderDate: dto.date_commande ? new Date(dto.date_commande) : order.orderDate,
        totalCost: dto.cout_total !== undefined ? roundAmount(dto.cout_total) : order.totalCost,
      });

      return previous;
    });

    await this.auditService.log(requester.id, 'UPDATE_ORDER', 'Order', id, {
      oldStatus,
      ...dto,
    });

    return this.findOne(id, requester);
  }

  /**
   * Deletes an order after undoing its stock effect. A cancelled order has
   * already been undone and is only removed.
   */
  async remove(id: number, requester: AuthenticatedUser): Promise<{ message: string }> {
    const removed = await this.dataSource.transaction(async (manager) => {
      const order = await this.findOne(id, requester, manager);

      if (order.status !== OrderStatus.CANCELLED) {
        await this.reverseStockEffect(manager, order);
      }

      await manager.delete(OrderLine, { orderId: order.id });
      await manager.delete(Order, { id: order.id });
      return order;
    });

    await this.auditService.log(requester.id, 'DELETE_ORDER', 'Order', id, {
      orderType: removed.orderType,
      status: removed.status,
      totalCost: removed.totalCost,
    });

    return { message: `La commande ${id} a été supprimée et le stock a été restauré` };
  }

  private async persistOrder(
    manager: EntityManager,
    orderType: OrderType,
    lines: NewOrderLine[],
    header: NewOrderHeader,
  ): Promise<Order> {
    if (lines.length === 0) {
      throw new BadRequestException('Une commande doit contenir au moins une ligne');
    }

    await this.suppliersService.findOne(header.supplierId, manager);

    const productIds = [...new Set(lines.map((line) => line.productId))];
    const existing = await this.productsService.findExistingIds(productIds, manager);
    const missing = productIds.filter((productId) => !existing.has(productId));
    if (missing.length > 0) {
      throw new NotFoundException(`Produit(s) non trouvé(s) : ${missing.join(', ')}`);
    }

    const orderRepository = manager.getRepository(Order);
    const lineRepository = manager.getRepository(OrderLine);

    const order = orderRepository.create({
      orderDate: new Date(),
      status: header.status ?? OrderStatus.PENDING,
      orderType,
      supplierId: header.supplierId,
      company: header.company,
      totalCost: sumLineTotals(lines),
      createdByUserId: header.createdByUserId,
    });
    const savedOrder = await orderRepository.save(order);

    const names = await this.productNames(manager, lines);
    const savedLines = await lineRepository.save(
      lines.map((line) =>
        lineRepository.create({
          orderId: savedOrder.id,
          productId: line.productId,
          productName: line.productName ?? names.get(line.productId) ?? '',
          quantity: line.quantity,
          unitPrice: line.unitPrice,
        }),
      ),
    );

    savedOrder.lines = savedLines;
    return savedOrder;
  }

  private async productNames(manager: EntityManager, lines: NewOrderLine[]): Promise<Map<number, string>> {
    const names = new Map<number, string>();
    for (const line of lines) {
      if (line.productName === undefined && !names.has(line.productId)) {
        const product = await this.productsService.findOne(line.productId, manager);
        names.set(product.id, product.name);
      }
    }
    return names;
  }

  // CART orders hold reserved stock (give it back); RESTOCK orders added stock (take it back)
  private async reverseStockEffect(manager: EntityManager, order: Order): Promise<void> {
    for (const line of order.lines) {
      if (line.productId === null) {
        continue;
      }

      const applied = order.orderType === OrderType.CART
        ? await this.productsService.incrementStock(line.productId, line.quantity, manager)
        : await this.productsService.decrementStock(line.productId, line.quantity, manager);

      if (!applied) {
        this.logger.warn(`Order ${order.id}: product ${line.productId} no longer exists, stock not adjusted`);
      }
    }
  }
}
