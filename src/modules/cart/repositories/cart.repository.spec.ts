import { seedMovie } from '../../../../test/utils/seed';
import {
  createTestingContext,
  TestingContext,
} from '../../../../test/utils/testing-module';
import { CatalogModule } from '../../catalog/catalog.module';
import { CartModule } from '../cart.module';
import { CartRepository } from './cart.repository';

describe('CartRepository', () => {
  let context: TestingContext;
  let repository: CartRepository;

  beforeEach(async () => {
    context = await createTestingContext({
      imports: [CatalogModule, CartModule],
    });
    repository = context.module.get(CartRepository);
  });

  afterEach(async () => {
    await context.close();
  });

  it('reports a second cart for the same user as a duplicate', async () => {
    const first = await repository.createForUser(7);
    const second = await repository.createForUser(7);

    expect(first.ok).toBe(true);
    expect(second).toEqual({ ok: false, error: 'duplicate' });
  });

  it('reports the same movie twice in one cart as a duplicate', async () => {
    const movie = await seedMovie(context.dataSource, 'Heat', '9.99');
    const cart = await repository.createForUser(7);
    if (!cart.ok) throw new Error('cart was not created');

    expect((await repository.addItem(cart.value.id, movie.id)).ok).toBe(true);
    expect(await repository.addItem(cart.value.id, movie.id)).toEqual({
      ok: false,
      error: 'duplicate',
    });
  });

  it('keeps an outer transaction usable after a duplicate insert', async () => {
    await repository.createForUser(7);

    const outcome = await context.dataSource.transaction(async (manager) => {
      const duplicateCart = await repository.createForUser(7, manager);
      const other = await repository.createForUser(8, manager);
      return { duplicateCart, other };
    });

    expect(outcome.duplicateCart.ok).toBe(false);
    expect(outcome.other.ok).toBe(true);
    expect(await repository.findByUserId(8)).not.toBeNull();
  });

  it('reports whether the cart delete removed anything', async () => {
    const cart = await repository.createForUser(7);
    if (!cart.ok) throw new Error('cart was not created');

    expect(await repository.deleteCart(cart.value.id)).toBe(true);
    expect(await repository.deleteCart(cart.value.id)).toBe(false);
  });
});
