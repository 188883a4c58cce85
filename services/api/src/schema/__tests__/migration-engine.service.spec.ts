/**
 * Tidewater - Migration Engine Tests
 */

import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { MigrationEngine, sortMigrations } from '../migration-engine.service';
import { MIGRATION_LEDGER, MIGRATION_RUNNER } from '../schema.constants';
import { UnitRegistry, migrationName } from '../../units/unit-registry.service';
import { UNIT_DEFINITIONS } from '../../units/units.constants';
import type { ModuleUnit, PluginUnit, UnitDefinitions } from '../../units/unit.types';
import { InstalledUnitsService } from '../../system/installed-units.service';
import { VersionNotFoundError } from '../../common/errors';
import { MemoryNotesOutput } from '../../common/notes-output';
import { InMemoryLedger } from '../../test/in-memory-ledger';
import { FakeMigration, FakeSeeder, RecordingRunner } from '../../test/recording-runner';
import { FakeInstalledUnits } from '../../test/fake-stores';

// ============================================================================
// FIXTURES
// ============================================================================

const BLOG_PATH = 'plugins/acme/blog/updates';
const SYSTEM_PATH = 'modules/system/database/migrations';

const systemModule: ModuleUnit = {
  code: 'System',
  migrations: [
    new FakeMigration('CreateUnits1700000002000'),
    new FakeMigration('CreateParameters1700000001000', 'Parameters ready'),
  ],
  seeder: new FakeSeeder(['Seeded core hash', 'Seeded counters']),
};

const blogPlugin: PluginUnit = {
  code: 'Acme.Blog',
  name: 'Blog',
  icon: 'icon-pencil',
  versions: [
    { version: '1.0.0', notes: 'First release', migrations: [new FakeMigration('CreatePosts1700000000000', 'Posts table ready')] },
    { version: '1.0.1', notes: 'Bug fixes', migrations: [] },
    {
      version: '1.1.0',
      notes: 'Adds slugs and tags',
      migrations: [new FakeMigration('AddTags1700000200000'), new FakeMigration('AddSlug1700000100000')],
    },
  ],
};

describe('MigrationEngine', () => {
  let engine: MigrationEngine;
  let ledger: InMemoryLedger;
  let runner: RecordingRunner;
  let installedUnits: FakeInstalledUnits;
  let notes: MemoryNotesOutput;

  beforeEach(async () => {
    ledger = new InMemoryLedger();
    runner = new RecordingRunner();
    installedUnits = new FakeInstalledUnits();
    notes = new MemoryNotesOutput();

    const definitions: UnitDefinitions = { modules: [systemModule], plugins: [blogPlugin] };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MigrationEngine,
        UnitRegistry,
        { provide: UNIT_DEFINITIONS, useValue: definitions },
        { provide: MIGRATION_LEDGER, useValue: ledger },
        { provide: MIGRATION_RUNNER, useValue: runner },
        { provide: InstalledUnitsService, useValue: installedUnits },
      ],
    }).compile();

    engine = module.get<MigrationEngine>(MigrationEngine);
    engine.setNotesOutput(notes);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ============================================================================
  // ORDERING
  // ============================================================================

  describe('sortMigrations', () => {
    it('orders by the trailing timestamp before the name', () => {
      const sorted = sortMigrations([
        new FakeMigration('Alpha1700000002000'),
        new FakeMigration('Zeta1700000001000'),
        new FakeMigration('Beta1700000002000'),
      ]);

      expect(sorted.map(migrationName)).toEqual(['Zeta1700000001000', 'Alpha1700000002000', 'Beta1700000002000']);
    });
  });

  // ============================================================================
  // apply / seed
  // ============================================================================

  describe('apply', () => {
    it('runs pending migrations in order as one batch', async () => {
      const applied = await engine.apply(SYSTEM_PATH, systemModule.migrations);

      expect(applied).toEqual(['CreateParameters1700000001000', 'CreateUnits1700000002000']);
      expect(runner.calls).toEqual(['up:CreateParameters1700000001000', 'up:CreateUnits1700000002000']);
      expect(ledger.entries.map((entry) => [entry.migration, entry.batch, entry.version])).toEqual([
        ['CreateParameters1700000001000', 1, null],
        ['CreateUnits1700000002000', 1, null],
      ]);
      expect(engine.getNotices().entries()).toEqual([['CreateParameters1700000001000', ['Parameters ready']]]);
    });

    it('skips migrations already in the ledger', async () => {
      await engine.apply(SYSTEM_PATH, systemModule.migrations);
      runner.calls.length = 0;

      await expect(engine.apply(SYSTEM_PATH, systemModule.migrations)).resolves.toEqual([]);
      expect(runner.calls).toEqual([]);
    });

    it('numbers each run as the next batch', async () => {
      await engine.apply(SYSTEM_PATH, [new FakeMigration('First1700000000001')]);
      await engine.apply(BLOG_PATH, [new FakeMigration('Second1700000000002')]);

      expect(ledger.entries.map((entry) => entry.batch)).toEqual([1, 2]);
    });

    it('keeps the ledger entries of migrations that finished before a failure', async () => {
      runner.failOn = 'up:CreateUnits1700000002000';

      await expect(engine.apply(SYSTEM_PATH, systemModule.migrations)).rejects.toThrow(
        'up:CreateUnits1700000002000 failed',
      );
      expect(ledger.entries.map((entry) => entry.migration)).toEqual(['CreateParameters1700000001000']);
    });
  });

  describe('seed', () => {
    it('runs the seeder once and records its notices', async () => {
      await expect(engine.seed(systemModule)).resolves.toBe(true);

      expect(runner.calls).toEqual(['seed']);
      expect(engine.getNotices().entries()).toEqual([['System seeder', ['Seeded core hash', 'Seeded counters']]]);
    });

    it('does nothing for a module without a seeder', async () => {
      await expect(engine.seed({ code: 'Cms', migrations: [] })).resolves.toBe(false);
      expect(runner.calls).toEqual([]);
    });
  });

  // ============================================================================
  // rollback
  // ============================================================================

  describe('rollback', () => {
    beforeEach(async () => {
      await engine.apply(SYSTEM_PATH, [new FakeMigration('One1700000000001'), new FakeMigration('Two1700000000002')]);
      await engine.apply(SYSTEM_PATH, [new FakeMigration('Three1700000000003')]);
      runner.calls.length = 0;
    });

    it('reverts only the newest batch', async () => {
      // Unregistered migrations: dropped without a down step
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      await expect(engine.rollbackBatch([SYSTEM_PATH])).resolves.toBe(1);
      expect(ledger.entries.map((entry) => entry.migration)).toEqual(['One1700000000001', 'Two1700000000002']);
    });

    it('keeps going until every batch is reverted', async () => {
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      await expect(engine.rollback([SYSTEM_PATH])).resolves.toBe(3);
      expect(ledger.entries).toEqual([]);
    });

    it('runs down steps of registered migrations newest first', async () => {
      ledger.entries = [];
      await engine.apply(SYSTEM_PATH, systemModule.migrations);
      runner.calls.length = 0;

      await engine.rollback([SYSTEM_PATH]);

      expect(runner.calls).toEqual(['down:CreateUnits1700000002000', 'down:CreateParameters1700000001000']);
    });

    it('restores the same ledger content when the set is applied again', async () => {
      const [createUnits, createParameters] = systemModule.migrations;
      const ledgerContent = () =>
        ledger.entries.map(({ unitPath, migration, batch, version }) => ({ unitPath, migration, batch, version }));
      ledger.entries = [];
      await engine.apply(SYSTEM_PATH, [createParameters]);
      await engine.apply(SYSTEM_PATH, [createUnits]);
      const before = ledgerContent();

      await engine.rollback([SYSTEM_PATH]);
      expect(ledger.entries).toEqual([]);
      await engine.apply(SYSTEM_PATH, [createParameters]);
      await engine.apply(SYSTEM_PATH, [createUnits]);

      expect(before).toEqual([
        { unitPath: SYSTEM_PATH, migration: 'CreateParameters1700000001000', batch: 1, version: null },
        { unitPath: SYSTEM_PATH, migration: 'CreateUnits1700000002000', batch: 2, version: null },
      ]);
      expect(ledgerContent()).toEqual(before);
    });

    it('drops ledger entries whose migration is no longer registered', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      await engine.rollbackBatch([SYSTEM_PATH]);

      expect(runner.calls).toEqual([]);
      expect(warn).toHaveBeenCalledWith(
        `Migration Three1700000000003 of ${SYSTEM_PATH} is not registered, dropping its ledger entry`,
      );
    });

    it('returns zero when there is nothing to revert', async () => {
      await expect(engine.rollback([BLOG_PATH])).resolves.toBe(0);
    });
  });

  // ============================================================================
  // PLUGIN VERSIONS
  // ============================================================================

  describe('updatePlugin', () => {
    it('installs every declared version in order', async () => {
      await expect(engine.updatePlugin(blogPlugin)).resolves.toBe(3);

      expect(runner.calls).toEqual([
        'up:CreatePosts1700000000000',
        'up:AddSlug1700000100000',
        'up:AddTags1700000200000',
      ]);
      expect(ledger.entries.map((entry) => [entry.migration, entry.batch, entry.version])).toEqual([
        ['CreatePosts1700000000000', 1, '1.0.0'],
        ['AddSlug1700000100000', 2, '1.1.0'],
        ['AddTags1700000200000', 2, '1.1.0'],
      ]);
      expect(installedUnits.units.get('Acme.Blog')).toMatchObject({ version: '1.1.0', name: 'Blog', icon: 'icon-pencil' });
      expect(notes.lines).toEqual([
        ' - v1.0.0: First release',
        ' - v1.0.1: Bug fixes',
        ' - v1.1.0: Adds slugs and tags',
      ]);
    });

    it('applies only the versions after the installed one', async () => {
      installedUnits.add({ code: 'Acme.Blog', version: '1.0.1' });

      await expect(engine.updatePlugin(blogPlugin)).resolves.toBe(1);
      expect(runner.calls).toEqual(['up:AddSlug1700000100000', 'up:AddTags1700000200000']);
      expect(installedUnits.units.get('Acme.Blog')?.version).toBe('1.1.0');
    });

    it('does nothing when the installed version is not declared', async () => {
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      installedUnits.add({ code: 'Acme.Blog', version: '9.9.9' });

      await expect(engine.updatePlugin(blogPlugin)).resolves.toBe(0);
      expect(runner.calls).toEqual([]);
    });
  });

  describe('rollbackToVersion', () => {
    beforeEach(async () => {
      await engine.updatePlugin(blogPlugin);
      runner.calls.length = 0;
    });

    it('reverts everything shipped after the target, newest first', async () => {
      await expect(engine.rollbackToVersion(blogPlugin, '1.0.0')).resolves.toBe(2);

      expect(runner.calls).toEqual(['down:AddTags1700000200000', 'down:AddSlug1700000100000']);
      expect(ledger.entries.map((entry) => entry.migration)).toEqual(['CreatePosts1700000000000']);
      await expect(engine.getCurrentVersion('Acme.Blog')).resolves.toBe('1.0.0');
    });

    it('rejects a version that was never applied', async () => {
      await expect(engine.rollbackToVersion(blogPlugin, '2.0.0')).rejects.toBeInstanceOf(VersionNotFoundError);
      expect(runner.calls).toEqual([]);
    });
  });

  describe('removePlugin', () => {
    it('reverts every migration and forgets the install', async () => {
      await engine.updatePlugin(blogPlugin);
      runner.calls.length = 0;

      await expect(engine.removePlugin(blogPlugin)).resolves.toBe(true);

      expect(runner.calls).toEqual([
        'down:AddTags1700000200000',
        'down:AddSlug1700000100000',
        'down:CreatePosts1700000000000',
      ]);
      expect(ledger.entries).toEqual([]);
      expect(installedUnits.units.has('Acme.Blog')).toBe(false);
    });

    it('reports when there was nothing to remove', async () => {
      await expect(engine.removePlugin(blogPlugin)).resolves.toBe(false);
    });
  });

  describe('purgePlugin', () => {
    it('drops ledger entries and the install record without running down steps', async () => {
      await ledger.log({ unitPath: 'plugins/acme/gone/updates', migration: 'CreateGone1700000000000', batch: 1, version: '1.0.0' });
      installedUnits.add({ code: 'Acme.Gone', version: '1.0.0' });

      await expect(engine.purgePlugin('Acme.Gone')).resolves.toBe(true);

      expect(runner.calls).toEqual([]);
      expect(ledger.entries).toEqual([]);
      expect(installedUnits.units.has('Acme.Gone')).toBe(false);
    });

    it('matches the install record whatever the case of the code', async () => {
      await ledger.log({ unitPath: 'plugins/acme/old/updates', migration: 'CreateOld1700000000000', batch: 1, version: '1.0.0' });
      installedUnits.add({ code: 'Acme.Old', version: '1.0.0' });

      await expect(engine.purgePlugin('acme.old')).resolves.toBe(true);

      expect(ledger.entries).toEqual([]);
      expect([...installedUnits.units.keys()]).toEqual([]);
    });

    it('purges an install record that has no ledger entries', async () => {
      installedUnits.add({ code: 'Acme.Old', version: '1.0.0' });

      await expect(engine.purgePlugin('ACME.OLD')).resolves.toBe(true);

      expect(installedUnits.units.has('Acme.Old')).toBe(false);
    });

    it('reports an unknown plugin', async () => {
      await expect(engine.purgePlugin('Acme.Nobody')).resolves.toBe(false);
    });
  });
});
