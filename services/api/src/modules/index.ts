import type { UnitDefinitions } from '../units/unit.types';
import { systemUnit } from './system/system.unit';

/**
 * Units this application ships with. Plugins register alongside the base
 * modules here.
 */
export const unitDefinitions: UnitDefinitions = {
  modules: [systemUnit],
  plugins: [],
};
