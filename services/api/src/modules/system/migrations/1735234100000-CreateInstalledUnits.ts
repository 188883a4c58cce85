import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateInstalledUnits1735234100000 implements MigrationInterface {
  name = 'CreateInstalledUnits1735234100000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "installed_units" (
        "code" VARCHAR(191) PRIMARY KEY,
        "kind" VARCHAR(16) NOT NULL DEFAULT 'plugin',
        "version" VARCHAR(50) NOT NULL,
        "name" VARCHAR(255) NOT NULL,
        "icon" VARCHAR(255),
        "isFrozen" BOOLEAN NOT NULL DEFAULT false,
        "isUpdatable" BOOLEAN NOT NULL DEFAULT true,
        "createdAt" TIMESTAMP NOT NULL DEFAULT NOW(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT NOW()
      );
    `);

    await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_installed_units_kind" ON "installed_units" ("kind");`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_installed_units_kind";`);
    await queryRunner.query(`DROP TABLE IF EXISTS "installed_units";`);
  }
}
