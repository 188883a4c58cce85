import { Module } from '@nestjs/common';
import { SystemModule } from '../system/system.module';
import { MIGRATION_LEDGER, MIGRATION_RUNNER } from './schema.constants';
import { TypeOrmMigrationLedger } from './typeorm-migration-ledger';
import { TypeOrmMigrationRunner } from './migration-runner';
import { MigrationEngine } from './migration-engine.service';

@Module({
  imports: [SystemModule],
  providers: [
    { provide: MIGRATION_LEDGER, useClass: TypeOrmMigrationLedger },
    { provide: MIGRATION_RUNNER, useClass: TypeOrmMigrationRunner },
    MigrationEngine,
  ],
  exports: [MigrationEngine, MIGRATION_LEDGER],
})
export class SchemaModule {}
