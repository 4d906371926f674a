import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { decimalTransformer } from '../../../core/database/decimal.transformer';
import { OrderItem } from '../../orders/entities/order-item.entity';
import { Payment } from './payment.entity';

@Entity('payment_items')
export class PaymentItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'payment_id', type: 'integer' })
  paymentId!: number;

  @ManyToOne(() => Payment, (payment) => payment.items, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'payment_id' })
  payment!: Payment;

  @Column({ name: 'order_item_id', type: 'integer' })
  orderItemId!: number;

  @ManyToOne(() => OrderItem, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'order_item_id' })
  orderItem!: OrderItem;

  @Column({
    name: 'price_at_payment',
    type: 'decimal',
    precision: 10,
    scale: 2,
    transformer: decimalTransformer,
  })
  priceAtPayment!: string;
}
