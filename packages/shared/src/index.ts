/**
 * Tidewater - Shared Package
 * Re-exports all shared types, enums, constants, and utilities
 */

// Enums
export * from './enums.js';

// Types
export * from './types/index.js';

// Constants
export * from './constants.js';

// Utilities
export * from './utils.js';
