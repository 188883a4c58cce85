import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, Table } from 'typeorm';
import { LEDGER } from '@tidewater/shared';
import type { LedgerEntry, MigrationLedger, NewLedgerEntry } from './migration-ledger';

interface LedgerRow {
  id: number | string;
  unit_path: string;
  migration: string;
  batch: number | string;
  version: string | null;
}

/**
 * Ledger kept in a table whose name comes from MIGRATIONS_TABLE, so it is
 * managed through the query runner rather than an entity.
 */
@Injectable()
export class TypeOrmMigrationLedger implements MigrationLedger {
  private readonly table: string;

  constructor(
    private readonly dataSource: DataSource,
    configService: ConfigService,
  ) {
    this.table = configService.get<string>('MIGRATIONS_TABLE', LEDGER.DEFAULT_TABLE);
  }

  async repositoryExists(): Promise<boolean> {
    const queryRunner = this.dataSource.createQueryRunner();
    try {
      return await queryRunner.hasTable(this.table);
    } finally {
      await queryRunner.release();
    }
  }

  async createRepository(): Promise<void> {
    const queryRunner = this.dataSource.createQueryRunner();
    try {
      await queryRunner.createTable(
        new Table({
          name: this.table,
          columns: [
            { name: 'id', type: 'int', isPrimary: true, isGenerated: true, generationStrategy: 'increment' },
            { name: 'unit_path', type: 'varchar', length: '255' },
            { name: 'migration', type: 'varchar', length: '255' },
            { name: 'batch', type: 'int' },
            { name: 'version', type: 'varchar', length: '50', isNullable: true },
          ],
        }),
        true,
      );
    } finally {
      await queryRunner.release();
    }
  }

  async deleteRepository(): Promise<void> {
    const queryRunner = this.dataSource.createQueryRunner();
    try {
      await queryRunner.dropTable(this.table, true);
    } finally {
      await queryRunner.release();
    }
  }

  async getRan(unitPath: string): Promise<string[]> {
    const rows = await this.dataSource
      .createQueryBuilder()
      .select('ledger.migration', 'migration')
      .from(this.table, 'ledger')
      .where('ledger.unit_path = :unitPath', { unitPath })
      .orderBy('ledger.id', 'ASC')
      .getRawMany<Pick<LedgerRow, 'migration'>>();

    return rows.map((row) => row.migration);
  }

  async getEntries(unitPaths: string[]): Promise<LedgerEntry[]> {
    if (unitPaths.length === 0) {
      return [];
    }

    const rows = await this.dataSource
      .createQueryBuilder()
      .select('ledger.id', 'id')
      .addSelect('ledger.unit_path', 'unit_path')
      .addSelect('ledger.migration', 'migration')
      .addSelect('ledger.batch', 'batch')
      .addSelect('ledger.version', 'version')
      .from(this.table, 'ledger')
      .where('ledger.unit_path IN (:...unitPaths)', { unitPaths })
      .orderBy('ledger.batch', 'ASC')
      .addOrderBy('ledger.id', 'ASC')
      .getRawMany<LedgerRow>();

    return rows.map((row) => ({
      id: Number(row.id),
      unitPath: row.unit_path,
      migration: row.migration,
      batch: Number(row.batch),
      version: row.version,
    }));
  }

  async getLastBatchNumber(): Promise<number> {
    const row = await this.dataSource
      .createQueryBuilder()
      .select('MAX(ledger.batch)', 'max')
      .from(this.table, 'ledger')
      .getRawOne<{ max: number | string | null }>();

    return row && row.max !== null ? Number(row.max) : 0;
  }

  async log(entry: NewLedgerEntry): Promise<void> {
    await this.dataSource
      .createQueryBuilder()
      .insert()
      .into(this.table)
      .values({
        unit_path: entry.unitPath,
        migration: entry.migration,
        batch: entry.batch,
        version: entry.version,
      })
      .execute();
  }

  async delete(entry: Pick<LedgerEntry, 'unitPath' | 'migration'>): Promise<void> {
    await this.dataSource
      .createQueryBuilder()
      .delete()
      .from(this.table)
      .where('unit_path = :unitPath AND migration = :migration', {
        unitPath: entry.unitPath,
        migration: entry.migration,
      })
      .execute();
  }
}
