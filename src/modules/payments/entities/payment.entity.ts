import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { decimalTransformer } from '../../../core/database/decimal.transformer';
import { PaymentStatus } from '../../../domain/commerce';
import { Order } from '../../orders/entities/order.entity';
import { PaymentItem } from './payment-item.entity';

@Entity('payments')
@Index('ix_payments_user_id', ['userId'])
// at most one open attempt per order
@Index('uq_payments_open_order', ['orderId'], {
  unique: true,
  where: `"status" IN ('pending', 'processing')`,
})
export class Payment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @ManyToOne(() => Order, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'order_id' })
  order!: Order;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @Column({
    type: 'simple-enum',
    enum: PaymentStatus,
    default: PaymentStatus.PENDING,
  })
  status!: PaymentStatus;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    transformer: decimalTransformer,
  })
  amount!: string;

  @Column({
    name: 'external_payment_id',
    type: 'varchar',
    length: 255,
    nullable: true,
    unique: true,
  })
  externalPaymentId!: string | null;

  /** Last time the sweep asked the provider about this payment. */
  @Column({ name: 'last_checked_at', type: Date, nullable: true })
  lastCheckedAt!: Date | null;

  @OneToMany(() => PaymentItem, (item) => item.payment, {
    cascade: ['insert'],
  })
  items!: PaymentItem[];
}
