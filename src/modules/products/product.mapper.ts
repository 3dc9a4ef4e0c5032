import { Product, ProductRow } from './product.types';

export const mapProduct = (row: ProductRow): Product => ({
  id: row.id,
  name: row.name,
  description: row.description,
  // NOTE: REAL columns can come back as integers for whole prices.
  price: Number(row.price),
  imagePath: row.image_path,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export const mapProducts = (rows: ProductRow[]): Product[] => rows.map(mapProduct);
