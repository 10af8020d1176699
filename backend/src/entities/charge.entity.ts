import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

@Entity('charges')
export class Charge {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 255 })
  nature!: string;

  @Column({ type: 'float' })
  amount!: number;

  // YYYY-MM-DD
  @Column({ name: 'charge_date', type: 'date' })
  chargeDate!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
