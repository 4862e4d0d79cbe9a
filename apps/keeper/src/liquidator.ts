import type { LiquidationPlan, LiquidationResult, Position } from "@plinth/types";
import type { CollateralEngine } from "@plinth/engine";

function min(...values: bigint[]): bigint {
  return values.reduce((a, b) => (b < a ? b : a));
}

/**
 * Decide how much of `position`'s debt the keeper covers, and against
 * which asset.
 *
 * Seizes the asset the target holds the most USD value of. The amount is
 * bounded by the target's debt, the keeper's debt-token balance, the
 * optional per-call cap, and the debt that asset's balance can back at the
 * current price (the bonus is capped by the engine, the base is not).
 * Returns null when nothing can be covered.
 */
export function planLiquidation(
  engine: CollateralEngine,
  keeper: string,
  position: Position,
  maxDebtToCover = 0n
): LiquidationPlan | null {
  let best: { asset: string; valueUsd: bigint } | null = null;
  for (const [asset, balance] of Object.entries(position.collateral)) {
    const valueUsd = engine.getUsdValue(asset, balance);
    if (!best || valueUsd > best.valueUsd) best = { asset, valueUsd };
  }
  if (!best) return null;

  const bounds = [position.totalDebt, engine.getDebtToken().balanceOf(keeper), best.valueUsd];
  if (maxDebtToCover > 0n) bounds.push(maxDebtToCover);

  const debtToCover = min(...bounds);
  if (debtToCover <= 0n) return null;

  return { target: position.account, asset: best.asset, debtToCover };
}

export function executeLiquidation(
  engine: CollateralEngine,
  keeper: string,
  plan: LiquidationPlan
): LiquidationResult {
  return engine.liquidate(keeper, plan.asset, plan.target, plan.debtToCover);
}
