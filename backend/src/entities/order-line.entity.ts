import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Check } from 'typeorm';
import { Order } from './order.entity';
import { Product } from './product.entity';

@Entity('order_lines')
@Check('CHK_order_lines_quantity', '"quantity" > 0')
export class OrderLine {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'order_id', type: 'int' })
  orderId!: number;

  @ManyToOne(() => Order, order => order.lines, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'order_id' })
  order!: Order;

  // null once the product has been deleted
  @Column({ name: 'product_id', type: 'int', nullable: true })
  productId!: number | null;

  @ManyToOne(() => Product, product => product.orderLines, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'product_id' })
  product!: Product | null;

  @Column({ name: 'product_name', length: 255 })
  productName!: string;

  @Column({ type: 'int' })
  quantity!: number;

  // Prix au moment de l'achat, jamais relu depuis le produit
  @Column({ name: 'unit_price', type: 'float' })
  unitPrice!: number;
}
