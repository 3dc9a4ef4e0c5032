import { Module } from '@nestjs/common';
import { DatabaseService } from '../common/database.service';
import { ImagesModule } from '../images/images.module';
import { ProductsController } from './products.controller';
import { ProductsRepository } from './products.repository';
import { ProductsService } from './products.service';

@Module({
  imports: [ImagesModule],
  controllers: [ProductsController],
  providers: [ProductsService, ProductsRepository, DatabaseService],
})
export class ProductsModule {}
