import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { OrderLine } from '../entities/order-line.entity';
import { OrderStatus } from '../entities/order.entity';
import { roundAmount } from '../common/money';

export interface ProductStatistics {
  productId: number;
  productName: string;
  quantity: number;
  revenue: number;
}

interface ProductStatisticsRow {
  productId: number | string;
  productName: string;
  quantity: number | string | null;
  revenue: number | string | null;
}

@Injectable()
export class StatisticsService {
  constructor(
    @InjectRepository(OrderLine)
    private orderLineRepository: Repository<OrderLine>,
  ) {}

  /**
   * Quantity and revenue per product over every order line that still
   * references it, cancelled orders included unless `excludeCancelled`.
   * Grouped by product id; the name is the product's current one.
   */
  async productStatistics(excludeCancelled = false): Promise<ProductStatistics[]> {
    const query = this.orderLineRepository
      .createQueryBuilder('line')
      .innerJoin('line.product', 'product')
      .innerJoin('line.order', 'order')
      .select('product.id', 'productId')
      .addSelect('product.name', 'productName')
      .addSelect('SUM(line.quantity)', 'quantity')
      .addSelect('SUM(line.quantity * line.unitPrice)', 'revenue')
      .groupBy('product.id')
      .addGroupBy('product.name')
      .orderBy('product.name', 'ASC')
      .addOrderBy('product.id', 'ASC');

    if (excludeCancelled) {
      query.where('order.status != :cancelled', { cancelled: OrderStatus.CANCELLED });
    }

    const rows = await query.getRawMany<ProductStatisticsRow>();

    // Les pilotes renvoient les agrégats en texte ou en nombre
    return rows.map((row) => ({
      productId: Number(row.productId),
      productName: row.productName,
      quantity: Number(row.quantity ?? 0),
      revenue: roundAmount(Number(row.revenue ?? 0)),
    }));
  }
}
