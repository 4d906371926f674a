import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import {
  Between,
  DataSource,
  EntityManager,
  FindOptionsWhere,
  In,
  LessThanOrEqual,
  MoreThanOrEqual,
} from 'typeorm';
import {
  ORDER_STATUSES_HOLDING_MOVIES,
  orderSourcesFor,
  OrderStatus,
} from '../../../domain/commerce';
import { OrderItem } from '../entities/order-item.entity';
import { Order } from '../entities/order.entity';

export interface NewOrder {
  userId: number;
  totalAmount: string;
  items: Array<{ movieId: number; priceAtOrder: string }>;
}

export interface OrderFilters {
  userId?: number;
  dateFrom?: Date;
  dateTo?: Date;
  status?: OrderStatus;
}

@Injectable()
export class OrderRepository {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  async create(
    data: NewOrder,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Order> {
    const repository = manager.getRepository(Order);
    const order = repository.create({
      userId: data.userId,
      status: OrderStatus.PENDING,
      totalAmount: data.totalAmount,
      items: data.items.map((item) =>
        manager.getRepository(OrderItem).create(item),
      ),
    });
    return repository.save(order);
  }

  async findById(
    orderId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Order | null> {
    return manager.getRepository(Order).findOne({
      where: { id: orderId },
      relations: { items: true },
      order: { items: { id: 'ASC' } },
    });
  }

  async findByUser(userId: number): Promise<Order[]> {
    return this.findAll({ userId });
  }

  /** Newest first. Date bounds are inclusive. */
  async findAll(filters: OrderFilters = {}): Promise<Order[]> {
    const where: FindOptionsWhere<Order> = {};
    if (filters.userId !== undefined) where.userId = filters.userId;
    if (filters.status !== undefined) where.status = filters.status;
    if (filters.dateFrom && filters.dateTo) {
      where.createdAt = Between(filters.dateFrom, filters.dateTo);
    } else if (filters.dateFrom) {
      where.createdAt = MoreThanOrEqual(filters.dateFrom);
    } else if (filters.dateTo) {
      where.createdAt = LessThanOrEqual(filters.dateTo);
    }

    return this.dataSource.getRepository(Order).find({
      where,
      relations: { items: true },
      order: { createdAt: 'DESC', id: 'DESC', items: { id: 'ASC' } },
    });
  }

  /**
   * Movies among `movieIds` that the user already holds through a paid or a
   * pending order.
   */
  async findMovieIdsHeldByUser(
    userId: number,
    movieIds: number[],
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Set<number>> {
    if (movieIds.length === 0) return new Set();

    const rows = await manager
      .getRepository(OrderItem)
      .createQueryBuilder('item')
      .innerJoin('item.order', 'o')
      .select('item.movie_id', 'movieId')
      .distinct(true)
      .where('o.user_id = :userId', { userId })
      .andWhere('o.status IN (:...statuses)', {
        statuses: [...ORDER_STATUSES_HOLDING_MOVIES],
      })
      .andWhere('item.movie_id IN (:...movieIds)', { movieIds })
      .getRawMany<{ movieId: number | string }>();

    return new Set(rows.map((row) => Number(row.movieId)));
  }

  /**
   * Compare-and-set status write. Only succeeds while the order is in a
   * status from which `to` is reachable.
   */
  async transitionStatus(
    orderId: number,
    to: OrderStatus,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<boolean> {
    const result = await manager
      .getRepository(Order)
      .update({ id: orderId, status: In(orderSourcesFor(to)) }, { status: to });
    return (result.affected ?? 0) === 1;
  }
}
