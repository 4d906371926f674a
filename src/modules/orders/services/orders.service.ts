import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import {
  EmptyCartError,
  NoValidItemsError,
  NotAuthorizedError,
  OrderCannotBeCanceledError,
  OrderNotFoundError,
} from '../../../core/errors';
import { logger } from '../../../core/logger/logger.config';
import { sumAmounts } from '../../../core/utils/money.util';
import { OrderStatus } from '../../../domain/commerce';
import { CartRepository } from '../../cart/repositories/cart.repository';
import { MovieCatalogService } from '../../catalog/services/movie-catalog.service';
import { Order } from '../entities/order.entity';
import {
  OrderFilters,
  OrderRepository,
} from '../repositories/order.repository';

export interface CreateOrderResult {
  order: Order;
  excludedMovieIds: number[];
}

@Injectable()
export class OrdersService {
  private readonly logger = logger();

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly orderRepository: OrderRepository,
    private readonly cartRepository: CartRepository,
    private readonly catalog: MovieCatalogService,
  ) {}

  /**
   * Converts the user's cart into a pending order and consumes the cart.
   * Movies the user already holds through a paid or pending order are left
   * out and reported back.
   */
  async createOrder(userId: number): Promise<CreateOrderResult> {
    const result = await this.dataSource.transaction(async (manager) => {
      const cart = await this.cartRepository.findByUserId(userId, manager);
      if (!cart) {
        throw new EmptyCartError(userId);
      }

      const cartMovieIds = cart.items.map((item) => item.movieId);
      const held = await this.orderRepository.findMovieIdsHeldByUser(
        userId,
        cartMovieIds,
        manager,
      );

      const excludedMovieIds = cartMovieIds.filter((id) => held.has(id));
      const eligibleIds = cartMovieIds.filter((id) => !held.has(id));
      if (eligibleIds.length === 0) {
        throw new NoValidItemsError(userId);
      }

      const movies = await this.catalog.getMoviesByIds(eligibleIds, manager);
      const items = eligibleIds.flatMap((movieId) => {
        const movie = movies.get(movieId);
        return movie ? [{ movieId, priceAtOrder: movie.price }] : [];
      });
      if (items.length === 0) {
        throw new NoValidItemsError(userId);
      }

      const order = await this.orderRepository.create(
        {
          userId,
          totalAmount: sumAmounts(items.map((item) => item.priceAtOrder)),
          items,
        },
        manager,
      );

      // a concurrent conversion of the same cart must not produce a second order
      const consumed = await this.cartRepository.deleteCart(cart.id, manager);
      if (!consumed) {
        throw new EmptyCartError(userId);
      }

      return { order, excludedMovieIds };
    });

    this.logger.info(
      {
        userId,
        orderId: result.order.id,
        totalAmount: result.order.totalAmount,
        items: result.order.items.length,
        excludedMovieIds: result.excludedMovieIds,
      },
      'Order created',
    );

    return result;
  }

  async cancelOrder(orderId: number, userId: number): Promise<Order> {
    const order = await this.getOwnedOrder(orderId, userId);

    if (order.status !== OrderStatus.PENDING) {
      throw new OrderCannotBeCanceledError(orderId, order.status);
    }

    const canceled = await this.orderRepository.transitionStatus(
      orderId,
      OrderStatus.CANCELED,
    );
    if (!canceled) {
      const current = await this.orderRepository.findById(orderId);
      throw new OrderCannotBeCanceledError(
        orderId,
        current?.status ?? order.status,
      );
    }

    this.logger.info({ orderId, userId }, 'Order canceled');
    order.status = OrderStatus.CANCELED;
    return order;
  }

  async getUserOrders(userId: number): Promise<Order[]> {
    return this.orderRepository.findByUser(userId);
  }

  async getAllOrders(filters: OrderFilters = {}): Promise<Order[]> {
    return this.orderRepository.findAll(filters);
  }

  /**
   * Loads an order and checks that `userId` owns it.
   */
  async getOwnedOrder(orderId: number, userId: number): Promise<Order> {
    const order = await this.orderRepository.findById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    if (order.userId !== userId) {
      throw new NotAuthorizedError('order', orderId);
    }
    return order;
  }
}
