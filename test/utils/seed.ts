import { DataSource } from 'typeorm';
import { CartItem } from '../../src/modules/cart/entities/cart-item.entity';
import { Cart } from '../../src/modules/cart/entities/cart.entity';
import { Movie } from '../../src/modules/catalog/entities/movie.entity';

export async function seedMovie(
  dataSource: DataSource,
  title: string,
  price: string,
  year: number | null = 2020,
): Promise<Movie> {
  const repository = dataSource.getRepository(Movie);
  return repository.save(repository.create({ title, price, year }));
}

export async function seedCart(
  dataSource: DataSource,
  userId: number,
  movieIds: number[],
): Promise<Cart> {
  const cart = await dataSource
    .getRepository(Cart)
    .save(dataSource.getRepository(Cart).create({ userId }));

  for (const movieId of movieIds) {
    await dataSource
      .getRepository(CartItem)
      .save(dataSource.getRepository(CartItem).create({ cartId: cart.id, movieId }));
  }

  return cart;
}
