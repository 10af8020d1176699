import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToMany, JoinColumn, Check } from 'typeorm';
import { Supplier } from './supplier.entity';
import { OrderLine } from './order-line.entity';

@Entity('products')
@Check('CHK_products_stock', '"stock" >= 0')
export class Product {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 100, unique: true })
  reference!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  // Prix d'achat unitaire
  @Column({ name: 'unit_price', type: 'float' })
  unitPrice!: number;

  @Column({ name: 'sale_price', type: 'float', nullable: true })
  salePrice!: number | null;

  @Column({ type: 'int', default: 0 })
  stock!: number;

  @Column({ name: 'supplier_id', type: 'int', nullable: true })
  supplierId!: number | null;

  @ManyToOne(() => Supplier, supplier => supplier.products, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'supplier_id' })
  supplier!: Supplier | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;

  @OneToMany(() => OrderLine, line => line.product)
  orderLines!: OrderLine[];
}
