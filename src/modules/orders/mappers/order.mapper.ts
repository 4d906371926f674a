import { CreateOrderResponse, OrderResponse } from '../dto/order-response.dto';
import { Order } from '../entities/order.entity';

export class OrderMapper {
  static toResponse(order: Order): OrderResponse {
    return {
      id: order.id,
      userId: order.userId,
      createdAt: order.createdAt,
      status: order.status,
      totalAmount: order.totalAmount,
      items: (order.items ?? []).map((item) => ({
        id: item.id,
        movieId: item.movieId,
        priceAtOrder: item.priceAtOrder,
      })),
    };
  }

  static toCreateResponse(
    order: Order,
    excludedMovieIds: number[],
  ): CreateOrderResponse {
    return { ...this.toResponse(order), excludedMovieIds };
  }
}
