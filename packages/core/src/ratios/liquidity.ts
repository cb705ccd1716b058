/**
 * Liquidity ratios
 */

import { InvalidInputError } from '../errors/index.js';
import { safeDivide, validateNonNegative, validatePositive } from '../safety/index.js';

/**
 * Current assets / current liabilities
 */
export function calculateCurrentRatio(currentAssets: number, currentLiabilities: number): number {
  validateNonNegative(currentAssets, 'Current assets');
  validatePositive(currentLiabilities, 'Current liabilities');

  return safeDivide(currentAssets, currentLiabilities);
}

/**
 * (Current assets − inventory) / current liabilities
 */
export function calculateQuickRatio(currentAssets: number, inventory: number, currentLiabilities: number): number {
  validateNonNegative(currentAssets, 'Current assets');
  validateNonNegative(inventory, 'Inventory');
  validatePositive(currentLiabilities, 'Current liabilities');

  if (inventory > currentAssets) {
    throw new InvalidInputError(`Inventory cannot exceed current assets: ${inventory}`, 'Inventory', inventory);
  }

  return safeDivide(currentAssets - inventory, currentLiabilities);
}
