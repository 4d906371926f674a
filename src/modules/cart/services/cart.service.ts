import { Injectable } from '@nestjs/common';
import {
  CartNotFoundError,
  MovieAlreadyInCartError,
  MovieNotFoundError,
  MovieNotInCartError,
} from '../../../core/errors';
import { logger } from '../../../core/logger/logger.config';
import { sumAmounts } from '../../../core/utils/money.util';
import { MovieCatalogService } from '../../catalog/services/movie-catalog.service';
import { CartItemResponse, CartResponse } from '../dto/cart-response.dto';
import { CartItem } from '../entities/cart-item.entity';
import { Cart } from '../entities/cart.entity';
import { CartRepository } from '../repositories/cart.repository';

@Injectable()
export class CartService {
  private readonly logger = logger();

  constructor(
    private readonly cartRepository: CartRepository,
    private readonly catalog: MovieCatalogService,
  ) {}

  async addMovie(userId: number, movieId: number): Promise<CartItemResponse> {
    const movie = await this.catalog.getMovieById(movieId);
    if (!movie) {
      throw new MovieNotFoundError(movieId);
    }

    const cart = await this.getOrCreateCart(userId);

    const existing = await this.cartRepository.findItem(cart.id, movieId);
    if (existing) {
      throw new MovieAlreadyInCartError(movieId);
    }

    const added = await this.cartRepository.addItem(cart.id, movieId);
    if (!added.ok) {
      throw new MovieAlreadyInCartError(movieId);
    }

    this.logger.info(
      { userId, cartId: cart.id, movieId, cartItemId: added.value.id },
      'Movie added to cart',
    );

    return {
      id: added.value.id,
      movieId,
      addedAt: added.value.addedAt,
      movie,
    };
  }

  async removeMovie(
    userId: number,
    movieId: number,
  ): Promise<CartItemResponse> {
    const cart = await this.cartRepository.findByUserId(userId);
    if (!cart) {
      throw new CartNotFoundError(userId);
    }

    const item = cart.items.find((candidate) => candidate.movieId === movieId);
    if (!item) {
      throw new MovieNotInCartError(movieId);
    }

    const removed = await this.cartRepository.removeItem(item.id);
    if (!removed) {
      throw new MovieNotInCartError(movieId);
    }

    this.logger.info(
      { userId, cartId: cart.id, movieId, cartItemId: item.id },
      'Movie removed from cart',
    );

    return CartService.toItemResponse(item);
  }

  async getCart(userId: number): Promise<CartResponse> {
    const cart = await this.cartRepository.findByUserId(userId);
    if (!cart) {
      throw new CartNotFoundError(userId);
    }

    const items = cart.items.map((item) => CartService.toItemResponse(item));

    return {
      id: cart.id,
      userId: cart.userId,
      createdAt: cart.createdAt,
      items,
      totalAmount: sumAmounts(items.map((item) => item.movie.price)),
    };
  }

  async clear(userId: number): Promise<void> {
    const cart = await this.cartRepository.findByUserId(userId);
    if (!cart) {
      throw new CartNotFoundError(userId);
    }

    const deleted = await this.cartRepository.deleteCart(cart.id);
    if (!deleted) {
      throw new CartNotFoundError(userId);
    }

    this.logger.info(
      { userId, cartId: cart.id, items: cart.items.length },
      'Cart cleared',
    );
  }

  private async getOrCreateCart(userId: number): Promise<Cart> {
    const existing = await this.cartRepository.findByUserId(userId);
    if (existing) return existing;

    const created = await this.cartRepository.createForUser(userId);
    if (created.ok) {
      this.logger.info({ userId, cartId: created.value.id }, 'Cart created');
      return created.value;
    }

    // another request created it first
    const winner = await this.cartRepository.findByUserId(userId);
    if (!winner) {
      throw new CartNotFoundError(userId);
    }
    return winner;
  }

  private static toItemResponse(item: CartItem): CartItemResponse {
    return {
      id: item.id,
      movieId: item.movieId,
      addedAt: item.addedAt,
      movie: MovieCatalogService.toDetails(item.movie),
    };
  }
}
