/**
 * @file packages/core/src/index.ts
 * @description Main entry point for @unitconv/core package
 */

// Export all lib modules
export * from './lib/converter';
export * from './lib/registry';
export * from './lib/units';

// Export all shared modules
export * from './shared/converter-config';
export * from './shared/errors';
export * from './shared/quantity';

// Export all workflow modules
export * from './workflows/convert-workflow';
