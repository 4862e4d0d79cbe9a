import {
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from "./constants";

/**
 * Solvency ratio of a position, 1e18 = break-even.
 *
 *   hf = (collateralUsd * 50 / 100) * 1e18 / debt
 *
 * An account without debt is maximally healthy whatever it holds.
 */
export function calculateHealthFactor(totalDebt: bigint, totalCollateralUsd: bigint): bigint {
  if (totalDebt === 0n) return MAX_HEALTH_FACTOR;
  const adjustedCollateral = (totalCollateralUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (adjustedCollateral * PRECISION) / totalDebt;
}

export function isHealthy(healthFactor: bigint): boolean {
  return healthFactor >= MIN_HEALTH_FACTOR;
}
