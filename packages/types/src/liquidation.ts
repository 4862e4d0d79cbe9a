// Types for engine.liquidate(...) and the keeper's liquidation planning.

/**
 * Outcome of a committed liquidation.
 */
export interface LiquidationResult {
  target: string;
  liquidator: string;
  asset: string;
  debtCovered: bigint;          // pegged units burned from the liquidator
  collateralSeized: bigint;     // raw amount paid to the liquidator, bonus included
  bonus: bigint;                // raw amount, capped at what the target still held
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

/**
 * A liquidation the keeper intends to submit.
 */
export interface LiquidationPlan {
  target: string;
  asset: string;
  debtToCover: bigint;
}
