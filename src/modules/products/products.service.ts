import {
  GatewayTimeoutException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  OnModuleInit,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Express } from 'express';
import {
  buildImageFileName,
  buildImageRelativePath,
  ensureUploadsDir,
  getImageExtension,
  removeImageQuietly,
  resolveImageFilePath,
} from '../common/image-storage';
import { DEFAULT_UPLOADS_DIR } from '../common/upload.constants';
import { ImageProcessingError, isOptimizationFailure } from '../images/image-errors';
import { ImageUploadService } from '../images/image-upload.service';
import { CreateProductDto } from './dto/create-product.dto';
import { UpdateProductDto } from './dto/update-product.dto';
import { Product, ProductPage } from './product.types';
import { ProductsRepository } from './products.repository';

export type ProductImageUpload = Pick<Express.Multer.File, 'buffer' | 'originalname'>;

const DEFAULT_PAGE = 1;
const DEFAULT_PAGE_SIZE = 10;
const MAX_PAGE_SIZE = 100;

const parseInteger = (value?: string) => {
  if (value === undefined || !/^-?\d+$/.test(value.trim())) {
    return Number.NaN;
  }
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : Number.NaN;
};

export function normalizePagination(page?: string, pageSize?: string) {
  const parsedSize = parseInteger(pageSize);
  const size = parsedSize >= 1 && parsedSize <= MAX_PAGE_SIZE ? parsedSize : DEFAULT_PAGE_SIZE;
  const parsedPage = parseInteger(page);
  // The row offset must stay an exact integer for SQLite.
  const lastPage = Math.floor(Number.MAX_SAFE_INTEGER / size);
  return {
    page: parsedPage >= 1 && parsedPage <= lastPage ? parsedPage : DEFAULT_PAGE,
    pageSize: size,
  };
}

export function toHttpException(error: ImageProcessingError): HttpException {
  switch (error.kind) {
    case 'decode':
      return new UnprocessableEntityException('Uploaded file is not a valid image');
    case 'timeout':
      return new GatewayTimeoutException('Image processing timed out');
    case 'write':
      return new InternalServerErrorException('Failed to process image');
  }
}

@Injectable()
export class ProductsService implements OnModuleInit {
  private readonly logger = new Logger(ProductsService.name);
  private readonly uploadsDir: string;

  constructor(
    private readonly products: ProductsRepository,
    private readonly imageUpload: ImageUploadService,
    config: ConfigService,
  ) {
    this.uploadsDir = config.get<string>('UPLOADS_DIR') || DEFAULT_UPLOADS_DIR;
  }

  onModuleInit() {
    ensureUploadsDir(this.uploadsDir);
  }

  list(page?: string, pageSize?: string): ProductPage {
    const pagination = normalizePagination(page, pageSize);
    const offset = (pagination.page - 1) * pagination.pageSize;
    const total = this.products.count();
    return {
      data: this.products.findPage(offset, pagination.pageSize),
      total,
      page: pagination.page,
      pageSize: pagination.pageSize,
      totalPages: Math.ceil(total / pagination.pageSize),
    };
  }

  findOne(id: string): Product {
    const productId = parseInteger(id);
    const product = productId > 0 ? this.products.findById(productId) : null;
    if (!product) {
      throw new NotFoundException('Product not found');
    }
    return product;
  }

  async create(dto: CreateProductDto, image?: ProductImageUpload) {
    const startedAt = Date.now();
    const imagePath = image ? await this.storeImage(image) : '';

    const product = this.persist(
      () =>
        this.products.create({
          name: dto.name,
          description: dto.description ?? '',
          price: dto.price,
          imagePath,
        }),
      imagePath,
      'Failed to create product',
    );

    this.logger.log(`Product created in ${Date.now() - startedAt}ms`);
    return product;
  }

  async update(id: string, dto: UpdateProductDto, image?: ProductImageUpload) {
    const startedAt = Date.now();
    const existing = this.findOne(id);

    const next: Product = { ...existing };
    if (dto.name !== undefined) next.name = dto.name;
    if (dto.description !== undefined) next.description = dto.description;
    if (dto.price !== undefined) next.price = dto.price;
    if (image) next.imagePath = await this.storeImage(image);

    const newImagePath = image ? next.imagePath : '';
    const saved = this.persist(() => this.products.save(next), newImagePath, 'Failed to update product');
    if (!saved) {
      removeImageQuietly(this.uploadsDir, newImagePath, this.logger);
      throw new NotFoundException('Product not found');
    }

    // The old file goes only once nothing points at it any more.
    if (image && existing.imagePath) {
      removeImageQuietly(this.uploadsDir, existing.imagePath, this.logger);
    }

    this.logger.log(`Product updated in ${Date.now() - startedAt}ms`);
    return saved;
  }

  remove(id: string) {
    const product = this.findOne(id);
    const deleted = this.persist(() => this.products.delete(product.id), '', 'Failed to delete product');
    if (!deleted) {
      throw new NotFoundException('Product not found');
    }
    removeImageQuietly(this.uploadsDir, product.imagePath, this.logger);
    return { message: 'Product deleted successfully' };
  }

  private async storeImage(image: ProductImageUpload) {
    const extension = getImageExtension(image.originalname);
    const fileName = buildImageFileName(extension);
    const destination = resolveImageFilePath(this.uploadsDir, fileName);

    const result = await this.imageUpload.run(image.buffer, destination, extension);
    if (isOptimizationFailure(result)) {
      this.logger.warn(`Image ${image.originalname} rejected: ${result.error.message}`);
      throw toHttpException(result.error);
    }
    return buildImageRelativePath(fileName);
  }

  /** Runs a row write; on failure the image written for it is dropped. */
  private persist<T>(write: () => T, newImagePath: string, failureMessage: string): T {
    try {
      return write();
    } catch (error) {
      removeImageQuietly(this.uploadsDir, newImagePath, this.logger);
      this.logger.error(`${failureMessage}: ${String(error)}`);
      throw new InternalServerErrorException(failureMessage);
    }
  }
}
