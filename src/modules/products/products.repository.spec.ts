import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../common/database.service';
import { ProductsRepository } from './products.repository';

describe('ProductsRepository', () => {
  let database: DatabaseService;
  let repository: ProductsRepository;

  beforeEach(() => {
    const config = {
      get: jest.fn((key: string) => (key === 'DATABASE_PATH' ? ':memory:' : undefined)),
    } as unknown as ConfigService;
    database = new DatabaseService(config);
    database.onModuleInit();
    repository = new ProductsRepository(database);
  });

  afterEach(() => {
    database.onModuleDestroy();
  });

  it('creates a product and reads it back', () => {
    const created = repository.create({
      name: 'Ceramic mug',
      description: 'Holds 350ml',
      price: 12.5,
      imagePath: '/uploads/mug.jpg',
    });

    expect(created).toEqual({
      id: 1,
      name: 'Ceramic mug',
      description: 'Holds 350ml',
      price: 12.5,
      imagePath: '/uploads/mug.jpg',
      createdAt: expect.any(String),
      updatedAt: created.createdAt,
    });
    expect(repository.findById(1)).toEqual(created);
  });

  it('returns null for unknown ids', () => {
    expect(repository.findById(42)).toBeNull();
  });

  it('pages through products in id order', () => {
    for (const name of ['a', 'b', 'c', 'd', 'e']) {
      repository.create({ name, description: '', price: 1, imagePath: '' });
    }

    expect(repository.count()).toBe(5);
    expect(repository.findPage(2, 2).map((product) => product.name)).toEqual(['c', 'd']);
    expect(repository.findPage(4, 2).map((product) => product.name)).toEqual(['e']);
    expect(repository.findPage(10, 2)).toEqual([]);
  });

  it('saves every mutable field', () => {
    const created = repository.create({ name: 'Lamp', description: '', price: 30, imagePath: '' });

    const saved = repository.save({
      ...created,
      name: 'Desk lamp',
      description: 'LED',
      price: 35,
      imagePath: '/uploads/lamp.png',
    });

    expect(saved).toMatchObject({
      id: created.id,
      name: 'Desk lamp',
      description: 'LED',
      price: 35,
      imagePath: '/uploads/lamp.png',
      createdAt: created.createdAt,
    });
  });

  it('returns null when saving a product that no longer exists', () => {
    const created = repository.create({ name: 'Lamp', description: '', price: 30, imagePath: '' });
    repository.delete(created.id);

    expect(repository.save(created)).toBeNull();
  });

  it('reports whether a delete removed anything', () => {
    const created = repository.create({ name: 'Chair', description: '', price: 80, imagePath: '' });

    expect(repository.delete(created.id)).toBe(true);
    expect(repository.delete(created.id)).toBe(false);
    expect(repository.count()).toBe(0);
  });
});
