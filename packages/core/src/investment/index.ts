// Investment Analysis Module

export { calculateDcf, calculateNpv, calculatePaybackPeriod } from './cash-flows.js';
export { calculateIrr } from './irr.js';
export { calculateCapm, calculateRoi } from './returns.js';
export type { IrrOptions } from './types.js';
export { DEFAULT_IRR_OPTIONS } from './types.js';
