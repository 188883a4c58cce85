import { Inject, Injectable } from '@nestjs/common';
import type { MigrationInterface } from 'typeorm';
import { UNIT_DEFINITIONS } from './units.constants';
import type { ModuleUnit, PluginUnit, UnitDefinitions } from './unit.types';

/**
 * Name a migration is recorded under in the ledger
 */
export function migrationName(migration: MigrationInterface): string {
  return migration.name ?? migration.constructor.name;
}

/**
 * Registered base modules and plugins. Codes are matched case-insensitively;
 * plugins keep their registration order.
 */
@Injectable()
export class UnitRegistry {
  private readonly modules = new Map<string, ModuleUnit>();
  private readonly plugins = new Map<string, PluginUnit>();

  constructor(@Inject(UNIT_DEFINITIONS) definitions: UnitDefinitions) {
    definitions.modules.forEach((unit) => this.registerModule(unit));
    definitions.plugins.forEach((unit) => this.registerPlugin(unit));
  }

  registerModule(unit: ModuleUnit): void {
    this.modules.set(unit.code.toLowerCase(), unit);
  }

  registerPlugin(unit: PluginUnit): void {
    this.plugins.set(unit.code.toLowerCase(), unit);
  }

  findModule(code: string): ModuleUnit | undefined {
    return this.modules.get(code.toLowerCase());
  }

  findPlugin(code: string): PluginUnit | undefined {
    return this.plugins.get(code.toLowerCase());
  }

  getModules(): ModuleUnit[] {
    return [...this.modules.values()];
  }

  getPlugins(): PluginUnit[] {
    return [...this.plugins.values()];
  }

  modulePath(code: string): string {
    return `modules/${code.toLowerCase()}/database/migrations`;
  }

  pluginPath(code: string): string {
    return `plugins/${code.toLowerCase().split('.').join('/')}/updates`;
  }

  /**
   * Resolves a ledger entry back to the migration object that wrote it
   */
  findMigration(unitPath: string, name: string): MigrationInterface | undefined {
    const candidates = this.migrationsAt(unitPath);
    return candidates.find((migration) => migrationName(migration) === name);
  }

  private migrationsAt(unitPath: string): MigrationInterface[] {
    for (const unit of this.modules.values()) {
      if (this.modulePath(unit.code) === unitPath) {
        return unit.migrations;
      }
    }

    for (const unit of this.plugins.values()) {
      if (this.pluginPath(unit.code) === unitPath) {
        return unit.versions.flatMap((version) => version.migrations);
      }
    }

    return [];
  }
}
