import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { isUniqueViolation } from '../../../core/database/query-errors';
import {
  duplicate,
  ok,
  RepositoryResult,
} from '../../../core/database/repository-result';
import { CartItem } from '../entities/cart-item.entity';
import { Cart } from '../entities/cart.entity';

@Injectable()
export class CartRepository {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  /** Cart with its items and their movies, oldest item first. */
  async findByUserId(
    userId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Cart | null> {
    return manager.getRepository(Cart).findOne({
      where: { userId },
      relations: { items: { movie: true } },
      order: { items: { addedAt: 'ASC', id: 'ASC' } },
    });
  }

  async createForUser(
    userId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<RepositoryResult<Cart>> {
    try {
      const cart = await manager.transaction((tx) =>
        tx.getRepository(Cart).save(tx.getRepository(Cart).create({ userId })),
      );
      return ok(cart);
    } catch (error) {
      if (isUniqueViolation(error)) return duplicate();
      throw error;
    }
  }

  async findItem(
    cartId: number,
    movieId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<CartItem | null> {
    return manager.getRepository(CartItem).findOne({
      where: { cartId, movieId },
      relations: { movie: true },
    });
  }

  async addItem(
    cartId: number,
    movieId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<RepositoryResult<CartItem>> {
    try {
      const item = await manager.transaction((tx) =>
        tx
          .getRepository(CartItem)
          .save(tx.getRepository(CartItem).create({ cartId, movieId })),
      );
      return ok(item);
    } catch (error) {
      if (isUniqueViolation(error)) return duplicate();
      throw error;
    }
  }

  async removeItem(
    itemId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<boolean> {
    const result = await manager.getRepository(CartItem).delete({ id: itemId });
    return (result.affected ?? 0) > 0;
  }

  /**
   * Deletes the cart and its items.
   * @returns false when the cart was already gone
   */
  async deleteCart(
    cartId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<boolean> {
    await manager.getRepository(CartItem).delete({ cartId });
    const result = await manager.getRepository(Cart).delete({ id: cartId });
    return (result.affected ?? 0) === 1;
  }
}
