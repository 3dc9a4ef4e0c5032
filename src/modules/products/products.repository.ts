import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../common/database.service';
import { mapProduct, mapProducts } from './product.mapper';
import { NewProduct, Product, ProductRow } from './product.types';

type InsertParams = {
  name: string;
  description: string;
  price: number;
  imagePath: string;
  now: string;
};

type UpdateParams = Omit<InsertParams, 'now'> & { id: number; updatedAt: string };

const COLUMNS = 'id, name, description, price, image_path, created_at, updated_at';

@Injectable()
export class ProductsRepository {
  constructor(private readonly database: DatabaseService) {}

  private get db() {
    return this.database.connection;
  }

  findById(id: number): Product | null {
    const row = this.db
      .prepare<[number], ProductRow>(`SELECT ${COLUMNS} FROM products WHERE id = ?`)
      .get(id);
    return row ? mapProduct(row) : null;
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM products')
      .get();
    return row?.total ?? 0;
  }

  findPage(offset: number, limit: number): Product[] {
    const rows = this.db
      .prepare<[number, number], ProductRow>(
        `SELECT ${COLUMNS} FROM products ORDER BY id ASC LIMIT ? OFFSET ?`,
      )
      .all(limit, offset);
    return mapProducts(rows);
  }

  create(data: NewProduct): Product {
    const result = this.db
      .prepare<InsertParams>(
        `INSERT INTO products (name, description, price, image_path, created_at, updated_at)
         VALUES (@name, @description, @price, @imagePath, @now, @now)`,
      )
      .run({ ...data, now: new Date().toISOString() });
    const created = this.findById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error(`Product ${String(result.lastInsertRowid)} vanished after insert`);
    }
    return created;
  }

  /** Writes every mutable column of `product`; returns null if the row is gone. */
  save(product: Product): Product | null {
    const result = this.db
      .prepare<UpdateParams>(
        `UPDATE products
         SET name = @name, description = @description, price = @price,
             image_path = @imagePath, updated_at = @updatedAt
         WHERE id = @id`,
      )
      .run({
        id: product.id,
        name: product.name,
        description: product.description,
        price: product.price,
        imagePath: product.imagePath,
        updatedAt: new Date().toISOString(),
      });
    return result.changes > 0 ? this.findById(product.id) : null;
  }

  delete(id: number): boolean {
    return this.db.prepare<[number]>('DELETE FROM products WHERE id = ?').run(id).changes > 0;
  }
}
