/**
 * Tidewater - Types Index
 * Re-exports all types from this module
 */

export * from './json.types.js';
export * from './updates.types.js';
export * from './products.types.js';
