import { Injectable } from '@nestjs/common';
import { DataSource, type MigrationInterface, type QueryRunner } from 'typeorm';
import type { Seedable } from '../units/unit.types';

export type MigrationDirection = 'up' | 'down';

/**
 * Executes a single migration step or seeder.
 */
export interface MigrationRunner {
  run(migration: MigrationInterface, direction: MigrationDirection): Promise<unknown>;
  seed(seeder: Seedable): Promise<unknown>;
}

@Injectable()
export class TypeOrmMigrationRunner implements MigrationRunner {
  constructor(private readonly dataSource: DataSource) {}

  async run(migration: MigrationInterface, direction: MigrationDirection): Promise<unknown> {
    // Migrations may opt out of the wrapping transaction, e.g. for CREATE INDEX CONCURRENTLY
    return this.withQueryRunner(migration.transaction !== false, (queryRunner) =>
      direction === 'up' ? migration.up(queryRunner) : migration.down(queryRunner),
    );
  }

  async seed(seeder: Seedable): Promise<unknown> {
    return this.withQueryRunner(true, (queryRunner) => seeder.seed(queryRunner));
  }

  private async withQueryRunner(
    transactional: boolean,
    work: (queryRunner: QueryRunner) => Promise<unknown>,
  ): Promise<unknown> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();

    if (transactional) {
      await queryRunner.startTransaction();
    }

    try {
      const result = await work(queryRunner);
      if (transactional) {
        await queryRunner.commitTransaction();
      }
      return result;
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      throw error;
    } finally {
      await queryRunner.release();
    }
  }
}
