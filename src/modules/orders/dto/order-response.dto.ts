import { OrderStatus } from '../../../domain/commerce';

export interface OrderItemResponse {
  id: number;
  movieId: number;
  priceAtOrder: string;
}

export interface OrderResponse {
  id: number;
  userId: number;
  createdAt: Date;
  status: OrderStatus;
  totalAmount: string;
  items: OrderItemResponse[];
}

export interface CreateOrderResponse extends OrderResponse {
  /** Cart movies left out because the user already holds them */
  excludedMovieIds: number[];
}

export interface MessageResponse {
  message: string;
}
