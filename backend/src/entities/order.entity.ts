import { Entity, PrimaryGeneratedColumn, Column, UpdateDateColumn, ManyToOne, OneToMany, JoinColumn } from 'typeorm';
import { Supplier } from './supplier.entity';
import { User } from './user.entity';
import { OrderLine } from './order-line.entity';

export enum OrderStatus {
  PENDING = 'PENDING',
  CONFIRMED = 'CONFIRMED',
  RECEIVED = 'RECEIVED',
  CANCELLED = 'CANCELLED',
}

// How the order moved stock when it was created:
// CART    - reserved (decremented) line by line at add-to-cart time
// RESTOCK - incremented when the purchase order was recorded
export enum OrderType {
  CART = 'CART',
  RESTOCK = 'RESTOCK',
}

@Entity('orders')
export class Order {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'order_date' })
  orderDate!: Date;

  @Column({ type: 'simple-enum', enum: OrderStatus, default: OrderStatus.PENDING })
  status!: OrderStatus;

  @Column({ name: 'order_type', type: 'simple-enum', enum: OrderType })
  orderType!: OrderType;

  @Column({ name: 'supplier_id', type: 'int' })
  supplierId!: number;

  @ManyToOne(() => Supplier, supplier => supplier.orders)
  @JoinColumn({ name: 'supplier_id' })
  supplier!: Supplier;

  // Société pour laquelle la commande est passée (texte libre)
  @Column({ length: 255, default: '' })
  company!: string;

  @Column({ name: 'total_cost', type: 'float', default: 0 })
  totalCost!: number;

  @Column({ name: 'created_by_user_id', type: 'varchar', nullable: true })
  createdByUserId!: string | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'created_by_user_id' })
  createdByUser!: User | null;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @OneToMany(() => OrderLine, line => line.order, { cascade: true })
  lines!: OrderLine[];
}
