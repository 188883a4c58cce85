import { Controller, Get, Param, Query, UseGuards } from '@nestjs/common';
import type { ProductDetail } from '@tidewater/shared';
import { AdminTokenGuard } from '../common/admin-token.guard';
import { RateLimitGuard, RateLimit } from '../common/rate-limit.guard';
import { parseList } from '../common/config.util';
import { ProductCacheService } from './product-cache.service';

@Controller('products')
@UseGuards(AdminTokenGuard, RateLimitGuard)
export class ProductsController {
  constructor(private readonly productCache: ProductCacheService) {}

  /**
   * GET /products/:type?codes=Acme.Blog,Acme.Shop
   */
  @Get(':type')
  @RateLimit({ limit: 60, windowMs: 60000 })
  async lookup(
    @Param('type') type: string,
    @Query('codes') codes?: string,
  ): Promise<{ products: ProductDetail[] }> {
    const products = await this.productCache.lookup(type, parseList(codes, []));
    return { products };
  }

  @Get(':type/popular')
  @RateLimit({ limit: 60, windowMs: 60000 })
  async popular(@Param('type') type: string): Promise<{ products: ProductDetail[] }> {
    return { products: await this.productCache.popular(type) };
  }
}
