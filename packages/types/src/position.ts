// Types for the collateral engine's account views
// and the keeper's position scanning.

/**
 * Debt and collateral value for one account.
 * Mirrors engine.getAccountInformation(account).
 */
export interface AccountInformation {
  totalDebt: bigint;           // pegged units, 18 decimals
  collateralValueUsd: bigint;  // USD, 18 decimals
}

/**
 * A single account's position as seen by the keeper.
 */
export interface Position {
  account: string;
  collateral: Record<string, bigint>;  // asset id -> raw amount (asset's own decimals)
  totalDebt: bigint;
  collateralValueUsd: bigint;
  healthFactor: bigint;                // 1e18 = break-even
  isAtRisk: boolean;                   // healthFactor < MIN_HEALTH_FACTOR
}
