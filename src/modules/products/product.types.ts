export interface Product {
  id: number;
  name: string;
  description: string;
  price: number;
  imagePath: string;
  createdAt: string;
  updatedAt: string;
}

export interface ProductRow {
  id: number;
  name: string;
  description: string;
  price: number;
  image_path: string;
  created_at: string;
  updated_at: string;
}

export type NewProduct = Pick<Product, 'name' | 'description' | 'price' | 'imagePath'>;

export interface ProductPage {
  data: Product[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}
