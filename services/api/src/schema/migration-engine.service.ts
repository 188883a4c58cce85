/**
 * Migration Engine
 *
 * Applies and reverts migrations of base modules and plugins against the
 * ledger. Every applied migration is logged right after it completes, so a
 * failure part way through a batch leaves the finished steps recorded.
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { MigrationInterface } from 'typeorm';
import { UnitKind } from '@tidewater/shared';
import { VersionNotFoundError } from '../common/errors';
import type { NotesOutput } from '../common/notes-output';
import { InstalledUnitsService } from '../system/installed-units.service';
import { UnitRegistry, migrationName } from '../units/unit-registry.service';
import type { ModuleUnit, PluginUnit, PluginVersion } from '../units/unit.types';
import { MIGRATION_LEDGER, MIGRATION_RUNNER } from './schema.constants';
import type { LedgerEntry, MigrationLedger } from './migration-ledger';
import type { MigrationRunner } from './migration-runner';
import { NoticeCollector } from './notice-collector';

const TIMESTAMP_SUFFIX = /(\d{13})$/;

/**
 * Orders migrations by the timestamp their names end with, then by name.
 */
export function sortMigrations(migrations: MigrationInterface[]): MigrationInterface[] {
  const timestampOf = (name: string): number => {
    const match = TIMESTAMP_SUFFIX.exec(name);
    return match ? Number(match[1]) : 0;
  };

  return [...migrations].sort((a, b) => {
    const nameA = migrationName(a);
    const nameB = migrationName(b);
    return timestampOf(nameA) - timestampOf(nameB) || nameA.localeCompare(nameB);
  });
}

@Injectable()
export class MigrationEngine {
  private readonly logger = new Logger(MigrationEngine.name);
  private readonly notices = new NoticeCollector();
  private notesOutput: NotesOutput | null = null;

  constructor(
    @Inject(MIGRATION_LEDGER) private readonly ledger: MigrationLedger,
    @Inject(MIGRATION_RUNNER) private readonly runner: MigrationRunner,
    private readonly registry: UnitRegistry,
    private readonly installedUnits: InstalledUnitsService,
  ) {}

  setNotesOutput(output: NotesOutput | null): void {
    this.notesOutput = output;
  }

  getNotices(): NoticeCollector {
    return this.notices;
  }

  /**
   * Runs the migrations of `unitPath` not yet in the ledger as one new batch.
   * Returns the names applied.
   */
  async apply(
    unitPath: string,
    migrations: MigrationInterface[],
    version: string | null = null,
  ): Promise<string[]> {
    const ran = new Set(await this.ledger.getRan(unitPath));
    const pending = sortMigrations(migrations).filter((migration) => !ran.has(migrationName(migration)));

    if (pending.length === 0) {
      return [];
    }

    const batch = (await this.ledger.getLastBatchNumber()) + 1;
    const applied: string[] = [];

    for (const migration of pending) {
      const name = migrationName(migration);
      const notice = await this.runner.run(migration, 'up');
      await this.ledger.log({ unitPath, migration: name, batch, version });
      this.notices.add(name, notice);
      applied.push(name);
      this.logger.log(`Migrated ${unitPath}: ${name}`);
    }

    return applied;
  }

  async seed(unit: ModuleUnit): Promise<boolean> {
    if (!unit.seeder) {
      return false;
    }

    const notice = await this.runner.seed(unit.seeder);
    this.notices.add(`${unit.code} seeder`, notice);
    return true;
  }

  /**
   * Reverts the highest batch recorded for `unitPaths`, newest entry first.
   * Returns how many entries were removed.
   */
  async rollbackBatch(unitPaths: string[]): Promise<number> {
    const entries = await this.ledger.getEntries(unitPaths);
    if (entries.length === 0) {
      return 0;
    }

    const lastBatch = Math.max(...entries.map((entry) => entry.batch));
    const batchEntries = entries.filter((entry) => entry.batch === lastBatch).reverse();

    for (const entry of batchEntries) {
      await this.revert(entry);
    }

    return batchEntries.length;
  }

  /**
   * Reverts batch after batch until nothing is left for `unitPaths`.
   */
  async rollback(unitPaths: string[]): Promise<number> {
    let total = 0;
    let reverted = await this.rollbackBatch(unitPaths);

    while (reverted > 0) {
      total += reverted;
      reverted = await this.rollbackBatch(unitPaths);
    }

    return total;
  }

  async getCurrentVersion(code: string): Promise<string | null> {
    const unit = await this.installedUnits.find(code);
    return unit ? unit.version : null;
  }

  getVersionNotes(plugin: PluginUnit, version: string): string | null {
    const declared = plugin.versions.find((item) => item.version === version);
    return declared ? declared.notes : null;
  }

  /**
   * Brings a plugin up to its newest declared version. Returns the number of
   * versions applied.
   */
  async updatePlugin(plugin: PluginUnit): Promise<number> {
    const currentVersion = await this.getCurrentVersion(plugin.code);
    const pending = this.versionsAfter(plugin, currentVersion);
    const unitPath = this.registry.pluginPath(plugin.code);

    for (const release of pending) {
      await this.apply(unitPath, release.migrations, release.version);
      await this.installedUnits.record({
        code: plugin.code,
        kind: UnitKind.PLUGIN,
        name: plugin.name,
        icon: plugin.icon,
        version: release.version,
      });
      this.note(` - v${release.version}: ${release.notes}`);
    }

    return pending.length;
  }

  /**
   * Reverts every migration shipped after `targetVersion`.
   */
  async rollbackToVersion(plugin: PluginUnit, targetVersion: string): Promise<number> {
    const currentVersion = await this.getCurrentVersion(plugin.code);
    const applied = this.appliedVersions(plugin, currentVersion);
    const targetIndex = applied.findIndex((release) => release.version === targetVersion);

    if (targetIndex === -1) {
      throw new VersionNotFoundError(plugin.code, targetVersion);
    }

    const newer = new Set(applied.slice(targetIndex + 1).map((release) => release.version));
    const entries = await this.ledger.getEntries([this.registry.pluginPath(plugin.code)]);
    const reverting = entries
      .filter((entry) => entry.version !== null && newer.has(entry.version))
      .sort((a, b) => b.id - a.id);

    for (const entry of reverting) {
      await this.revert(entry);
    }

    await this.installedUnits.setVersion(plugin.code, targetVersion);
    return reverting.length;
  }

  /**
   * Reverts all of a plugin's migrations and forgets it was installed.
   * Returns `false` when there was nothing to remove.
   */
  async removePlugin(plugin: PluginUnit): Promise<boolean> {
    const entries = await this.ledger.getEntries([this.registry.pluginPath(plugin.code)]);
    const installed = await this.installedUnits.find(plugin.code);

    for (const entry of [...entries].sort((a, b) => b.id - a.id)) {
      await this.revert(entry);
    }

    const removed = await this.installedUnits.remove(plugin.code);
    return entries.length > 0 || installed !== null || removed;
  }

  /**
   * Drops the ledger entries and install record of a plugin whose code is no
   * longer registered, without running any `down` step.
   */
  async purgePlugin(code: string): Promise<boolean> {
    const entries = await this.ledger.getEntries([this.registry.pluginPath(code)]);

    for (const entry of entries) {
      await this.ledger.delete(entry);
    }

    // Install records keep the code's original case
    const lowerCode = code.toLowerCase();
    const installed = (await this.installedUnits.all(UnitKind.PLUGIN)).find(
      (unit) => unit.code.toLowerCase() === lowerCode,
    );
    const removed = installed ? await this.installedUnits.remove(installed.code) : false;
    return entries.length > 0 || removed;
  }

  private async revert(entry: LedgerEntry): Promise<void> {
    const migration = this.registry.findMigration(entry.unitPath, entry.migration);

    if (migration) {
      const notice = await this.runner.run(migration, 'down');
      this.notices.add(entry.migration, notice);
    } else {
      this.logger.warn(`Migration ${entry.migration} of ${entry.unitPath} is not registered, dropping its ledger entry`);
    }

    await this.ledger.delete(entry);
  }

  private versionsAfter(plugin: PluginUnit, currentVersion: string | null): PluginVersion[] {
    if (currentVersion === null) {
      return plugin.versions;
    }

    const index = plugin.versions.findIndex((release) => release.version === currentVersion);
    if (index === -1) {
      this.logger.warn(`Installed version ${currentVersion} of ${plugin.code} is not declared, skipping update`);
      return [];
    }

    return plugin.versions.slice(index + 1);
  }

  private appliedVersions(plugin: PluginUnit, currentVersion: string | null): PluginVersion[] {
    if (currentVersion === null) {
      return [];
    }

    const index = plugin.versions.findIndex((release) => release.version === currentVersion);
    return index === -1 ? [] : plugin.versions.slice(0, index + 1);
  }

  private note(line: string): void {
    this.notesOutput?.write(line);
  }
}
