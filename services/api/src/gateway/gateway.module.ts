import { Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { GatewayClientService } from './gateway-client.service';

@Module({
  imports: [SystemModule],
  providers: [GatewayClientService],
  exports: [GatewayClientService],
})
export class GatewayModule {}
