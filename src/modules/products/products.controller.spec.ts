import { BadRequestException } from '@nestjs/common';
import type { Express } from 'express';
import { imageUploadOptions, ProductsController } from './products.controller';
import { ProductsService } from './products.service';

const file = (mimetype: string) =>
  ({ mimetype, originalname: 'upload', buffer: Buffer.alloc(0) }) as Express.Multer.File;

describe('ProductsController', () => {
  it('passes the uploaded image to the service on create', async () => {
    const created = { id: 1, name: 'Mug', price: 9.5, imagePath: '/uploads/x.jpg' };
    const service = {
      create: jest.fn().mockResolvedValue(created),
    } as unknown as ProductsService;
    const controller = new ProductsController(service);
    const image = file('image/jpeg');

    await expect(controller.create({ name: 'Mug', price: 9.5 }, image)).resolves.toBe(created);
    expect(service.create).toHaveBeenCalledWith({ name: 'Mug', price: 9.5 }, image);
  });

  it('forwards raw pagination query values', () => {
    const service = {
      list: jest.fn().mockReturnValue({ data: [], total: 0, page: 1, pageSize: 10, totalPages: 0 }),
    } as unknown as ProductsService;
    const controller = new ProductsController(service);

    controller.list('2', '50');

    expect(service.list).toHaveBeenCalledWith('2', '50');
  });

  it('accepts image uploads and rejects other types', () => {
    const cb = jest.fn();

    imageUploadOptions.fileFilter({}, file('image/png'), cb);
    imageUploadOptions.fileFilter({}, file('application/pdf'), cb);

    expect(cb).toHaveBeenNthCalledWith(1, null, true);
    expect(cb).toHaveBeenNthCalledWith(2, expect.any(BadRequestException), false);
  });
});
