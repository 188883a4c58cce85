import { Controller, Get } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { RedisService } from '../redis/redis.service';

interface HealthResponse {
  status: string;
  timestamp: string;
  version: string;
  uptime: number;
}

interface ReadinessResponse {
  ready: boolean;
  database: boolean;
  redis: boolean;
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly dataSource: DataSource,
    private readonly redis: RedisService,
  ) {}

  @Get()
  check(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '0.1.0',
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  async ready(): Promise<ReadinessResponse> {
    const database = await this.pingDatabase();
    const redis = this.redis.isConnected();
    return { ready: database && redis, database, redis };
  }

  @Get('live')
  live(): { live: boolean } {
    return { live: true };
  }

  private async pingDatabase(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }
}
