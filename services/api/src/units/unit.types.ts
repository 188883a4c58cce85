import type { MigrationInterface, QueryRunner } from 'typeorm';

/** Informational output of a migration or seeder */
export type Notice = string | string[] | void;

/**
 * Seeds a base module's initial data after its first migration run.
 */
export interface Seedable {
  seed(queryRunner: QueryRunner): Promise<Notice>;
}

/** A base module of the application, migrated before any plugin */
export interface ModuleUnit {
  code: string;
  migrations: MigrationInterface[];
  seeder?: Seedable;
}

/** One declared release of a plugin */
export interface PluginVersion {
  version: string;
  notes: string;
  migrations: MigrationInterface[];
}

export interface PluginUnit {
  /** Author.Name, e.g. `Acme.Blog` */
  code: string;
  name: string;
  icon?: string;
  /** Oldest first */
  versions: PluginVersion[];
}

export interface UnitDefinitions {
  modules: ModuleUnit[];
  plugins: PluginUnit[];
}
