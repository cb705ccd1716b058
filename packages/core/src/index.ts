/**
 * @fincalc/core
 *
 * Pure financial calculations with a typed error taxonomy. Every function
 * validates its inputs and either returns a value or throws a FinanceError.
 */

export * from './errors/index.js';
export * from './interest/index.js';
export * from './investment/index.js';
export * from './loan/index.js';
export * from './ratios/index.js';
export * from './result.js';
export * from './safety/index.js';
export * from './statistics/index.js';
