import { Transform } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';
import { toPrice } from './price.transform';

export class CreateProductDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @Transform(toPrice)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  price!: number;
}
