import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { Movie } from '../../catalog/entities/movie.entity';
import { Cart } from './cart.entity';

@Entity('cart_items')
@Index('uq_cart_items_cart_movie', ['cartId', 'movieId'], { unique: true })
export class CartItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'cart_id', type: 'integer' })
  cartId!: number;

  @ManyToOne(() => Cart, (cart) => cart.items, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'cart_id' })
  cart!: Cart;

  @Column({ name: 'movie_id', type: 'integer' })
  movieId!: number;

  @ManyToOne(() => Movie, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'movie_id' })
  movie!: Movie;

  @CreateDateColumn({ name: 'added_at' })
  addedAt!: Date;
}
