/**
 * System module migrations, oldest first.
 */
export { CreateSystemParameters1735234000000 } from './1735234000000-CreateSystemParameters';
export { CreateInstalledUnits1735234100000 } from './1735234100000-CreateInstalledUnits';
