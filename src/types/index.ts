/**
 * Shared type definitions.
 */

export * from './core';
export * from './runtime';
