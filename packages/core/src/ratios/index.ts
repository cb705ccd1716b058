// Financial Ratios Module

export { calculateDebtToEquity, calculateWacc } from './capital.js';
export { calculateCurrentRatio, calculateQuickRatio } from './liquidity.js';
export { calculateRoa, calculateRoe } from './profitability.js';
export { calculateDividendYield, calculatePeRatio } from './valuation.js';
