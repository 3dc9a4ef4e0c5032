import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreateProductDto } from './create-product.dto';
import { UpdateProductDto } from './update-product.dto';

describe('Product DTOs', () => {
  it('accepts price as numeric string for create', async () => {
    const dto = plainToInstance(CreateProductDto, { name: 'Mug', price: '1.5' });

    const errors = await validate(dto);

    expect(errors).toHaveLength(0);
    expect(dto.price).toBe(1.5);
  });

  it('rejects a missing name and a negative price', async () => {
    const dto = plainToInstance(CreateProductDto, { price: '-2' });

    const errors = await validate(dto);

    expect(errors.map((error) => error.property).sort()).toEqual(['name', 'price']);
  });

  it('rejects a price that is not a number', async () => {
    const dto = plainToInstance(CreateProductDto, { name: 'Mug', price: 'ten' });

    const errors = await validate(dto);

    expect(errors.map((error) => error.property)).toEqual(['price']);
  });

  it('accepts price as numeric string for update', async () => {
    const dto = plainToInstance(UpdateProductDto, { price: '3.75' });

    const errors = await validate(dto);

    expect(errors).toHaveLength(0);
    expect(dto.price).toBe(3.75);
  });

  it('accepts an empty update', async () => {
    const errors = await validate(plainToInstance(UpdateProductDto, {}));

    expect(errors).toHaveLength(0);
  });
});
