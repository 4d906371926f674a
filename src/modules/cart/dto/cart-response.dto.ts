import { MovieDetails } from '../../catalog/services/movie-catalog.service';

export interface CartItemResponse {
  id: number;
  movieId: number;
  addedAt: Date;
  movie: MovieDetails;
}

export interface CartResponse {
  id: number;
  userId: number;
  createdAt: Date;
  items: CartItemResponse[];
  /** Sum of the current catalog prices of the items */
  totalAmount: string;
}
