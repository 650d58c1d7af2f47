/**
 * Type Definitions
 * @module types
 */

export * from './bench.js';
