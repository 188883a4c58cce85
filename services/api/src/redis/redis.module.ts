import { Module, Global, Inject, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { createClient } from 'redis';
import { REDIS_CLIENT, type RedisClient } from './redis.constants';
import { RedisService } from './redis.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: async (configService: ConfigService): Promise<RedisClient> => {
        const logger = new Logger('RedisModule');

        const client = createClient({
          url: configService.get<string>('REDIS_URL', 'redis://localhost:6379'),
          socket: {
            reconnectStrategy: (retries: number) => {
              if (retries > 10) {
                logger.error('Redis: Max reconnection attempts reached');
                return new Error('Max reconnection attempts reached');
              }
              return Math.min(retries * 100, 3000);
            },
          },
        });

        client.on('error', (err: unknown) => {
          logger.error('Redis Client Error:', err);
        });

        client.on('connect', () => {
          logger.log('Redis Client Connected');
        });

        client.on('reconnecting', () => {
          logger.warn('Redis Client Reconnecting...');
        });

        await client.connect();
        return client;
      },
    },
    RedisService,
  ],
  exports: [REDIS_CLIENT, RedisService],
})
export class RedisModule implements OnModuleDestroy {
  constructor(@Inject(REDIS_CLIENT) private readonly client: RedisClient) {}

  async onModuleDestroy(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}
