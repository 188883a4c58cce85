import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import type { JsonValue } from '@tidewater/shared';
import { AdminTokenGuard } from '../common/admin-token.guard';
import { RateLimitGuard, RateLimit } from '../common/rate-limit.guard';
import { GatewayClientService } from '../gateway/gateway-client.service';

@Controller('projects')
@UseGuards(AdminTokenGuard, RateLimitGuard)
export class ProjectsController {
  constructor(private readonly gateway: GatewayClientService) {}

  /**
   * GET /projects/:id - project details as the gateway reports them
   */
  @Get(':id')
  @RateLimit({ limit: 20, windowMs: 60000 })
  async findOne(@Param('id') id: string): Promise<{ project: JsonValue }> {
    return { project: await this.gateway.requestProjectDetails(id) };
  }
}
