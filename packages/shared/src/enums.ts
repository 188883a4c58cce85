/**
 * Tidewater - Protocol Enums
 * Enumerations shared by the update service and its clients
 */

/** Gateway protocol version sent with every request */
export const GATEWAY_PROTOCOL_VERSION = '1.3';

/** Marketplace product types with a detail catalogue */
export enum ProductType {
  PLUGIN = 'plugin',
  THEME = 'theme',
}

/** Downloadable artifact kinds */
export enum ArtifactKind {
  CORE = 'core',
  PLUGIN = 'plugin',
  THEME = 'theme',
}

/** Units that own migrations */
export enum UnitKind {
  MODULE = 'module',
  PLUGIN = 'plugin',
}

/** Machine-readable update error codes */
export enum UpdateErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  BAD_RESPONSE = 'BAD_RESPONSE',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  BAD_SIGNATURE = 'BAD_SIGNATURE',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  VERSION_NOT_FOUND = 'VERSION_NOT_FOUND',
  UNIT_NOT_FOUND = 'UNIT_NOT_FOUND',
  HASH_MISMATCH = 'HASH_MISMATCH',
}
