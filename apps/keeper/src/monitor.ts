import type { Position } from "@plinth/types";
import { isHealthy, type CollateralEngine } from "@plinth/engine";
import { logger } from "./logger";

/**
 * Reads every indebted account from the engine and ranks it by health
 * factor, worst first.
 */
export class PositionMonitor {
  constructor(private readonly engine: CollateralEngine) {}

  /**
   * Positions with outstanding debt, ascending health factor.
   * Accounts that cannot be valued (stale or invalid price) are logged and
   * left out of this round.
   */
  scan(): Position[] {
    const positions: Position[] = [];

    for (const account of this.engine.getAccounts()) {
      try {
        const position = this.readPosition(account);
        if (position.totalDebt > 0n) positions.push(position);
      } catch (err) {
        logger.warn(`Skipping ${account}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    return positions.sort((a, b) =>
      a.healthFactor < b.healthFactor ? -1 : a.healthFactor > b.healthFactor ? 1 : 0
    );
  }

  atRisk(): Position[] {
    return this.scan().filter((p) => p.isAtRisk);
  }

  readPosition(account: string): Position {
    const { totalDebt, collateralValueUsd } = this.engine.getAccountInformation(account);
    const healthFactor = this.engine.calculateHealthFactor(totalDebt, collateralValueUsd);

    const collateral: Record<string, bigint> = {};
    for (const asset of this.engine.getSupportedAssets()) {
      const balance = this.engine.getAccountCollateralBalance(account, asset);
      if (balance > 0n) collateral[asset] = balance;
    }

    return {
      account,
      collateral,
      totalDebt,
      collateralValueUsd,
      healthFactor,
      isAtRisk: !isHealthy(healthFactor),
    };
  }
}
