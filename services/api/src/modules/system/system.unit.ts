import type { ModuleUnit } from '../../units/unit.types';
import { CreateInstalledUnits1735234100000, CreateSystemParameters1735234000000 } from './migrations';
import { SystemSeeder } from './system.seeder';

export const systemUnit: ModuleUnit = {
  code: 'System',
  migrations: [new CreateSystemParameters1735234000000(), new CreateInstalledUnits1735234100000()],
  seeder: new SystemSeeder(),
};
