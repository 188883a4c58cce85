import { Module } from '@nestjs/common';
import { GatewayModule } from '../gateway/gateway.module';
import { ProductCacheService } from './product-cache.service';
import { ProductsController } from './products.controller';
import { ProjectsController } from './projects.controller';

@Module({
  imports: [GatewayModule],
  controllers: [ProductsController, ProjectsController],
  providers: [ProductCacheService],
  exports: [ProductCacheService],
})
export class ProductsModule {}
