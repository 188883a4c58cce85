import { Module } from '@nestjs/common';
import { GatewayModule } from '../gateway/gateway.module';
import { ProductsModule } from '../products/products.module';
import { SchemaModule } from '../schema/schema.module';
import { SystemModule } from '../system/system.module';
import { UpdateNegotiator } from './update-negotiator.service';
import { UpdateCoordinator } from './update-coordinator.service';
import { ArchiveExtractor } from './archive-extractor.service';
import { UpdatesController } from './updates.controller';

@Module({
  imports: [SystemModule, GatewayModule, ProductsModule, SchemaModule],
  controllers: [UpdatesController],
  providers: [UpdateNegotiator, UpdateCoordinator, ArchiveExtractor],
  exports: [UpdateNegotiator, UpdateCoordinator],
})
export class UpdatesModule {}
