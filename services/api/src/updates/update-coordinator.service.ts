/**
 * Update Coordinator
 *
 * Drives a complete update run: ledger bootstrap, base modules, plugins,
 * first-run seeding and the notice report. Also handles uninstall, plugin
 * rollback and artifact download/extraction.
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { join } from 'path';
import { ArtifactKind, PARAMETER_KEYS, UnitKind } from '@tidewater/shared';
import { UnitNotFoundError } from '../common/errors';
import { parseFlag, parseList } from '../common/config.util';
import type { NotesOutput } from '../common/notes-output';
import { GatewayClientService } from '../gateway/gateway-client.service';
import { ProductCacheService } from '../products/product-cache.service';
import { MigrationEngine } from '../schema/migration-engine.service';
import type { MigrationLedger } from '../schema/migration-ledger';
import { MIGRATION_LEDGER } from '../schema/schema.constants';
import { ParametersService } from '../system/parameters.service';
import { InstalledUnitsService } from '../system/installed-units.service';
import { ThemeInstallationsService } from '../units/theme-installations.service';
import { UnitRegistry } from '../units/unit-registry.service';
import type { ModuleUnit } from '../units/unit.types';
import { ArchiveExtractor } from './archive-extractor.service';

export interface DownloadOptions {
  /** Plugin is being installed rather than updated */
  installation?: boolean;
}

@Injectable()
export class UpdateCoordinator {
  private readonly logger = new Logger(UpdateCoordinator.name);
  private readonly baseModules: string[];
  private readonly coreUpdatesDisabled: boolean;
  private readonly basePath: string;
  private readonly pluginsPath: string;
  private readonly themesPath: string;
  private notesOutput: NotesOutput | null = null;

  constructor(
    configService: ConfigService,
    private readonly engine: MigrationEngine,
    @Inject(MIGRATION_LEDGER) private readonly ledger: MigrationLedger,
    private readonly registry: UnitRegistry,
    private readonly gateway: GatewayClientService,
    private readonly productCache: ProductCacheService,
    private readonly parameters: ParametersService,
    private readonly installedUnits: InstalledUnitsService,
    private readonly themes: ThemeInstallationsService,
    private readonly extractor: ArchiveExtractor,
  ) {
    this.baseModules = parseList(configService.get<string>('LOAD_MODULES'), ['System']);
    this.coreUpdatesDisabled = parseFlag(configService.get<string>('DISABLE_CORE_UPDATES'), true);
    this.basePath = configService.get<string>('BASE_PATH', process.cwd());
    this.pluginsPath = configService.get<string>('PLUGINS_PATH', join(this.basePath, 'plugins'));
    this.themesPath = configService.get<string>('THEMES_PATH', join(this.basePath, 'themes'));
  }

  setNotesOutput(output: NotesOutput | null): void {
    this.notesOutput = output;
    this.engine.setNotesOutput(output);
  }

  async runFullUpdate(): Promise<void> {
    const firstUp = !(await this.ledger.repositoryExists());
    if (firstUp) {
      await this.ledger.createRepository();
      this.note('Migration table created');
    }

    this.engine.getNotices().clear();

    const modules = this.resolveModules();
    for (const unit of modules) {
      this.note(unit.code);
      await this.engine.apply(this.registry.modulePath(unit.code), unit.migrations);
    }

    for (const plugin of this.registry.getPlugins()) {
      this.note(plugin.code);
      await this.engine.updatePlugin(plugin);
    }

    for (const unit of await this.installedUnits.all(UnitKind.PLUGIN)) {
      if (!this.registry.findPlugin(unit.code)) {
        this.note(`Unable to find: ${unit.code}`);
      }
    }

    await this.parameters.set(PARAMETER_KEYS.UPDATE_COUNT, 0);
    await this.productCache.clear();

    if (firstUp) {
      for (const unit of modules) {
        if (await this.engine.seed(unit)) {
          this.note(`Seeded ${unit.code}`);
        }
      }
    }

    this.printNotices();
    this.logger.log('Update run finished');
  }

  /**
   * Rolls every plugin back, newest registration first, then the base
   * modules, and finally drops the ledger.
   */
  async uninstallAll(): Promise<void> {
    for (const plugin of [...this.registry.getPlugins()].reverse()) {
      this.note(plugin.code);
      await this.engine.removePlugin(plugin);
    }

    const paths = [...this.baseModules].reverse().map((code) => this.registry.modulePath(code));
    await this.engine.rollback(paths);

    if (await this.ledger.repositoryExists()) {
      await this.ledger.deleteRepository();
      this.note('Migration table dropped');
    }

    this.printNotices();
    this.logger.log('Uninstall finished');
  }

  /**
   * Rolls a plugin back to `stopOnVersion`, or removes it entirely.
   */
  async rollbackPlugin(code: string, stopOnVersion?: string): Promise<void> {
    const plugin = this.registry.findPlugin(code);

    if (!plugin) {
      if (await this.engine.purgePlugin(code)) {
        this.note(`Purged from database: ${code}`);
        return;
      }
      throw new UnitNotFoundError(code);
    }

    if (stopOnVersion) {
      await this.engine.rollbackToVersion(plugin, stopOnVersion);
    } else if (!(await this.engine.removePlugin(plugin))) {
      throw new UnitNotFoundError(code);
    }

    this.note(`Rolled back: ${code}`);

    const currentVersion = await this.engine.getCurrentVersion(plugin.code);
    if (currentVersion) {
      const notes = this.engine.getVersionNotes(plugin, currentVersion) ?? '';
      this.note(`Current Version: ${currentVersion} (${notes})`);
    }
  }

  /**
   * Fetches an artifact from the gateway and unpacks it in place.
   */
  async downloadAndExtract(
    kind: ArtifactKind,
    identifier: string,
    hash: string,
    options: DownloadOptions = {},
  ): Promise<void> {
    switch (kind) {
      case ArtifactKind.CORE: {
        if (this.coreUpdatesDisabled) {
          this.note('Core updates are disabled');
          return;
        }
        await this.gateway.requestFile('core/get', 'core', hash, { type: 'update' });
        await this.extractor.extract(this.gateway.getFilePath('core'), this.basePath);
        return;
      }

      case ArtifactKind.PLUGIN: {
        const fileCode = `${identifier}${hash}`;
        await this.gateway.requestFile('plugin/get', fileCode, hash, {
          name: identifier,
          installation: options.installation ? 1 : 0,
        });
        const destination = join(this.pluginsPath, ...identifier.toLowerCase().split('.'));
        await this.extractor.extract(this.gateway.getFilePath(fileCode), destination);
        return;
      }

      case ArtifactKind.THEME: {
        const fileCode = `${identifier}${hash}`;
        await this.gateway.requestFile('theme/get', fileCode, hash, { name: identifier });
        const dirName = identifier.toLowerCase().split('.').join('-');
        await this.extractor.extract(this.gateway.getFilePath(fileCode), join(this.themesPath, dirName));
        await this.themes.setInstalled(identifier, dirName);
        return;
      }
    }
  }

  private resolveModules(): ModuleUnit[] {
    const modules: ModuleUnit[] = [];
    for (const code of this.baseModules) {
      const unit = this.registry.findModule(code);
      if (unit) {
        modules.push(unit);
      } else {
        this.note(`Unable to find: ${code}`);
      }
    }
    return modules;
  }

  private printNotices(): void {
    const notices = this.engine.getNotices();
    if (notices.isEmpty()) {
      return;
    }

    this.note('');
    for (const [source, messages] of notices.entries()) {
      this.note(`${source} reported:`);
      for (const message of messages) {
        this.note(` - ${message}`);
      }
    }
    notices.clear();
  }

  private note(line: string): void {
    this.notesOutput?.write(line);
  }
}
