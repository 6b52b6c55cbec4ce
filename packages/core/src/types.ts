/**
 * Shared type and error exports used across the lexer
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './error-registry.js';
export * from './error-classes.js';
