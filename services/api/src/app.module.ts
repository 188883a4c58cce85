import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HealthModule } from './health/health.module';
import { RedisModule } from './redis/redis.module';
import { SystemModule } from './system/system.module';
import { UnitsModule } from './units/units.module';
import { ProductsModule } from './products/products.module';
import { UpdatesModule } from './updates/updates.module';
import { ParameterEntity } from './system/parameter.entity';
import { InstalledUnitEntity } from './system/installed-unit.entity';
import { unitDefinitions } from './modules';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),

    // Redis (global)
    RedisModule,

    // Database - Supports both individual params and DATABASE_URL
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const databaseUrl = configService.get<string>('DATABASE_URL');
        const isProduction = configService.get<string>('NODE_ENV') === 'production';
        const isDevelopment = configService.get<string>('NODE_ENV') === 'development';

        // Tables are created by the System module's migrations, never synchronized
        const baseConfig = {
          type: 'postgres' as const,
          entities: [ParameterEntity, InstalledUnitEntity],
          synchronize: false,
          logging: isDevelopment ? ['error' as const, 'warn' as const] : ['error' as const],
          // Connection pool settings
          extra: {
            ssl: databaseUrl ? { rejectUnauthorized: false } : false,
            max: configService.get<number>('DATABASE_POOL_MAX', 10),
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 10000,
          },
          retryAttempts: isProduction ? 10 : 3,
          retryDelay: 3000,
        };

        if (databaseUrl) {
          return {
            ...baseConfig,
            url: databaseUrl,
          };
        }

        // Otherwise use individual connection params (local dev)
        return {
          ...baseConfig,
          host: configService.get<string>('DATABASE_HOST', 'localhost'),
          port: configService.get<number>('DATABASE_PORT', 5432),
          username: configService.get<string>('DATABASE_USER', 'tidewater'),
          password: configService.get<string>('DATABASE_PASSWORD', 'tidewater_dev_password'),
          database: configService.get<string>('DATABASE_NAME', 'tidewater'),
        };
      },
    }),

    // Installable units
    UnitsModule.forRoot(unitDefinitions),

    // Feature modules
    HealthModule,
    SystemModule,
    ProductsModule,
    UpdatesModule,
  ],
})
export class AppModule {}
