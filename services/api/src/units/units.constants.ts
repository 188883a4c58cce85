export const UNIT_DEFINITIONS = 'UNIT_DEFINITIONS';
