import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Key/value store for installation state (core build, update counters,
 * theme history).
 */
export class CreateSystemParameters1735234000000 implements MigrationInterface {
  name = 'CreateSystemParameters1735234000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "system_parameters" (
        "key" VARCHAR(191) PRIMARY KEY,
        "value" JSONB,
        "updatedAt" TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "system_parameters";`);
  }
}
