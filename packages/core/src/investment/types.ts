/**
 * Investment analysis types
 */

/**
 * Newton-Raphson settings for IRR
 */
export interface IrrOptions {
  /** Starting estimate (decimal rate) */
  guess?: number;
  /** Iteration budget */
  maxIterations?: number;
  /** Stop once successive estimates differ by less than this */
  tolerance?: number;
}

export const DEFAULT_IRR_OPTIONS: Readonly<Required<IrrOptions>> = Object.freeze({
  guess: 0.1,
  maxIterations: 100,
  tolerance: 1e-10,
});
