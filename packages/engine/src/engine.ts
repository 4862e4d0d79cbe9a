/**
 * CollateralEngine
 *
 * Accounts lock collateral, mint the pegged debt token against it, and
 * third parties liquidate positions whose health factor falls below 1.0.
 *
 * Every state-changing operation runs as one unit:
 *   1. reentrancy guard entered for the whole call
 *   2. ledger writes applied and solvency checked
 *   3. collaborator transfers / mint / burn performed
 *   4. any failure restores the ledgers and compensates step 3
 * Composites (depositCollateralAndMintDebt, redeemCollateralForDebt) are a
 * single unit: a failing second half also undoes the first.
 */

import type { AccountInformation, LiquidationResult } from "@plinth/types";
import { AssetRegistry } from "./asset-registry";
import { CollateralLedger } from "./collateral-ledger";
import {
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from "./constants";
import { DebtLedger } from "./debt-ledger";
import {
  DebtTooSmallError,
  HealthFactorBelowMinimumError,
  HealthFactorNotImprovedError,
  HealthFactorOkError,
  InsufficientBalanceError,
  MintFailedError,
  TransferFailedError,
  ZeroAmountError,
} from "./errors";
import { formatUnits, percentOf } from "./fixed-point";
import { calculateHealthFactor, isHealthy } from "./health-factor";
import type { Clock, DebtToken, FungibleAsset, PriceOracle } from "./interfaces";
import { createEngineLogger, type Logger } from "./logger";
import { ReentrancyGuard } from "./reentrancy-guard";
import { UnitOfWork } from "./unit-of-work";
import { Valuation } from "./valuation";

export interface EngineOptions {
  /** Collateral tokens, parallel to `priceFeeds`. */
  collateralTokens: readonly FungibleAsset[];
  priceFeeds: readonly PriceOracle[];
  debtToken: DebtToken;
  /** Account holding collateral and debt tokens on the engine's behalf. */
  custody: string;
  /** Max age of oracle data in seconds. Default 3h. */
  priceHeartbeat?: bigint;
  clock?: Clock;
  logger?: Logger;
}

export class CollateralEngine {
  private readonly assets: AssetRegistry;
  private readonly collateral = new CollateralLedger();
  private readonly debt = new DebtLedger();
  private readonly valuation: Valuation;
  private readonly guard = new ReentrancyGuard();
  private readonly debtToken: DebtToken;
  private readonly custody: string;
  private readonly logger: Logger;

  constructor(options: EngineOptions) {
    this.assets = new AssetRegistry(options.collateralTokens, options.priceFeeds);
    this.valuation = new Valuation({ heartbeat: options.priceHeartbeat, clock: options.clock });
    this.debtToken = options.debtToken;
    this.custody = options.custody;
    this.logger = options.logger ?? createEngineLogger("engine");
  }

  // -----------------------------------------------------------------------
  // Collateral
  // -----------------------------------------------------------------------

  /** Deposit only improves solvency, so no health-factor check. */
  depositCollateral(account: string, asset: string, amount: bigint): void {
    this.atomic("depositCollateral", (work) => {
      this.depositCollateralIn(work, account, asset, amount);
    });
  }

  redeemCollateral(account: string, asset: string, amount: bigint): void {
    this.atomic("redeemCollateral", (work) => {
      this.redeemCollateralFrom(work, asset, amount, account, account);
      this.revertIfHealthFactorIsBroken(account);
    });
  }

  // -----------------------------------------------------------------------
  // Debt
  // -----------------------------------------------------------------------

  /** Mints only once the post-mint health factor has been checked. */
  mintDebt(account: string, amount: bigint): void {
    this.atomic("mintDebt", (work) => {
      this.mintDebtTo(work, account, amount);
    });
  }

  burnDebt(account: string, amount: bigint): void {
    this.atomic("burnDebt", (work) => {
      this.burnDebtFor(work, amount, account, account);
      // Repaying cannot lower the health factor; checked for uniformity.
      this.revertIfHealthFactorIsBroken(account);
    });
  }

  // -----------------------------------------------------------------------
  // Composites
  // -----------------------------------------------------------------------

  depositCollateralAndMintDebt(
    account: string,
    asset: string,
    collateralAmount: bigint,
    debtAmount: bigint
  ): void {
    this.atomic("depositCollateralAndMintDebt", (work) => {
      this.depositCollateralIn(work, account, asset, collateralAmount);
      this.mintDebtTo(work, account, debtAmount);
    });
  }

  /** Burns first so the redemption check sees the reduced debt. */
  redeemCollateralForDebt(
    account: string,
    asset: string,
    collateralAmount: bigint,
    debtAmount: bigint
  ): void {
    this.atomic("redeemCollateralForDebt", (work) => {
      this.burnDebtFor(work, debtAmount, account, account);
      this.redeemCollateralFrom(work, asset, collateralAmount, account, account);
      this.revertIfHealthFactorIsBroken(account);
    });
  }

  // -----------------------------------------------------------------------
  // Liquidation
  // -----------------------------------------------------------------------

  /**
   * Repay `debtToCover` of `target`'s debt out of the liquidator's own debt
   * tokens and receive the equivalent `asset` collateral plus a 10% bonus.
   *
   * The debt-equivalent amount must be fully held by the target; the bonus
   * is capped at whatever of that asset the target has left.
   */
  liquidate(
    liquidator: string,
    asset: string,
    target: string,
    debtToCover: bigint
  ): LiquidationResult {
    const result = this.atomic("liquidate", (work): LiquidationResult => {
      if (debtToCover <= 0n) throw new ZeroAmountError();
      const collateralAsset = this.assets.get(asset);

      const startingHealthFactor = this.getAccountHealthFactor(target);
      if (isHealthy(startingHealthFactor)) {
        throw new HealthFactorOkError(startingHealthFactor);
      }

      const baseCollateral = this.valuation.tokenAmountFromUsd(collateralAsset, debtToCover);
      if (baseCollateral === 0n) throw new DebtTooSmallError(asset, debtToCover);
      const available = this.collateral.balanceOf(target, collateralAsset.id);
      if (baseCollateral > available) {
        throw new InsufficientBalanceError(baseCollateral, available);
      }
      const fullBonus = percentOf(baseCollateral, LIQUIDATION_BONUS, LIQUIDATION_PRECISION);
      const remaining = available - baseCollateral;
      const bonus = fullBonus < remaining ? fullBonus : remaining;
      const collateralSeized = baseCollateral + bonus;

      this.redeemCollateralFrom(work, asset, collateralSeized, target, liquidator);
      this.burnDebtFor(work, debtToCover, target, liquidator);

      const endingHealthFactor = this.getAccountHealthFactor(target);
      if (endingHealthFactor <= startingHealthFactor) {
        throw new HealthFactorNotImprovedError(startingHealthFactor, endingHealthFactor);
      }
      this.revertIfHealthFactorIsBroken(liquidator);

      return {
        target,
        liquidator,
        asset,
        debtCovered: debtToCover,
        collateralSeized,
        bonus,
        startingHealthFactor,
        endingHealthFactor,
      };
    });

    this.logger.info(
      `Liquidated ${target}: ${formatUnits(debtToCover)} debt covered by ${liquidator}, ` +
      `${result.collateralSeized} ${asset} seized (bonus ${result.bonus})`
    );
    return result;
  }

  // -----------------------------------------------------------------------
  // Views
  // -----------------------------------------------------------------------

  calculateHealthFactor(totalDebt: bigint, totalCollateralUsd: bigint): bigint {
    return calculateHealthFactor(totalDebt, totalCollateralUsd);
  }

  getAccountHealthFactor(account: string): bigint {
    const { totalDebt, collateralValueUsd } = this.getAccountInformation(account);
    return calculateHealthFactor(totalDebt, collateralValueUsd);
  }

  getAccountInformation(account: string): AccountInformation {
    return {
      totalDebt: this.debt.debtOf(account),
      collateralValueUsd: this.getAccountCollateralValue(account),
    };
  }

  /** Sum of usdValue over every registered asset the account holds. */
  getAccountCollateralValue(account: string): bigint {
    let total = 0n;
    for (const asset of this.assets.all()) {
      total += this.valuation.usdValue(asset, this.collateral.balanceOf(account, asset.id));
    }
    return total;
  }

  getUsdValue(asset: string, amount: bigint): bigint {
    return this.valuation.usdValue(this.assets.get(asset), amount);
  }

  getTokenAmountFromUsd(asset: string, usdAmount: bigint): bigint {
    return this.valuation.tokenAmountFromUsd(this.assets.get(asset), usdAmount);
  }

  getAccountCollateralBalance(account: string, asset: string): bigint {
    return this.collateral.balanceOf(account, this.assets.get(asset).id);
  }

  getSupportedAssets(): string[] {
    return this.assets.ids();
  }

  getCollateralPriceFeed(asset: string): PriceOracle {
    return this.assets.get(asset).oracle;
  }

  /** Every account with collateral or debt on the books. */
  getAccounts(): string[] {
    return [...new Set([...this.collateral.accounts(), ...this.debt.accounts()])];
  }

  getTotalDebt(): bigint {
    return this.debt.totalDebt();
  }

  getDebtToken(): DebtToken {
    return this.debtToken;
  }

  getLiquidationBonusPct(): bigint {
    return LIQUIDATION_BONUS;
  }

  getLiquidationThreshold(): bigint {
    return LIQUIDATION_THRESHOLD;
  }

  getMinHealthFactor(): bigint {
    return MIN_HEALTH_FACTOR;
  }

  getPrecision(): bigint {
    return PRECISION;
  }

  // -----------------------------------------------------------------------
  // Internal steps
  // -----------------------------------------------------------------------

  private atomic<T>(operation: string, body: (work: UnitOfWork) => T): T {
    return this.guard.run(operation, () =>
      new UnitOfWork(this.collateral, this.debt, this.logger).execute(operation, body)
    );
  }

  private depositCollateralIn(work: UnitOfWork, account: string, asset: string, amount: bigint): void {
    if (amount <= 0n) throw new ZeroAmountError();
    const { id, token } = this.assets.get(asset);

    this.collateral.deposit(account, id, amount);
    work.defer({
      stage: "pull",
      label: `pull ${amount} ${id} from ${account}`,
      apply: () => {
        if (!token.transferIn(account, amount)) {
          throw new TransferFailedError(id, "in", account, amount);
        }
      },
      compensate: () => {
        if (!token.transferOut(account, amount)) {
          throw new TransferFailedError(id, "out", account, amount);
        }
      },
      // The tokens stayed in custody; keep them on the account's books.
      retain: () => {
        this.collateral.deposit(account, id, amount);
      },
    });
  }

  /** Charge `amount` of collateral to `from`, pay it to `to`. */
  private redeemCollateralFrom(
    work: UnitOfWork,
    asset: string,
    amount: bigint,
    from: string,
    to: string
  ): void {
    if (amount <= 0n) throw new ZeroAmountError();
    const { id, token } = this.assets.get(asset);

    this.collateral.withdraw(from, id, amount);
    work.defer({
      stage: "payout",
      label: `pay ${amount} ${id} to ${to}`,
      apply: () => {
        if (!token.transferOut(to, amount)) {
          throw new TransferFailedError(id, "out", to, amount);
        }
      },
    });
  }

  private mintDebtTo(work: UnitOfWork, account: string, amount: bigint): void {
    this.debt.increaseDebt(account, amount);
    this.revertIfHealthFactorIsBroken(account);
    work.defer({
      stage: "settle",
      label: `mint ${amount} to ${account}`,
      apply: () => {
        if (!this.debtToken.mint(account, amount)) {
          throw new MintFailedError(account, amount);
        }
      },
    });
  }

  /** Reduce `onBehalfOf`'s debt, paid with `payer`'s debt tokens. */
  private burnDebtFor(work: UnitOfWork, amount: bigint, onBehalfOf: string, payer: string): void {
    this.debt.decreaseDebt(onBehalfOf, amount);
    const token = this.debtToken;
    work.defer({
      stage: "pull",
      label: `pull ${amount} ${token.id} from ${payer}`,
      apply: () => {
        if (!token.transferIn(payer, amount)) {
          throw new TransferFailedError(token.id, "in", payer, amount);
        }
      },
      compensate: () => {
        if (!token.transferOut(payer, amount)) {
          throw new TransferFailedError(token.id, "out", payer, amount);
        }
      },
    });
    work.defer({
      stage: "settle",
      label: `burn ${amount} ${token.id}`,
      apply: () => token.burn(amount),
      compensate: () => {
        if (!token.mint(this.custody, amount)) {
          throw new MintFailedError(this.custody, amount);
        }
      },
    });
  }

  private revertIfHealthFactorIsBroken(account: string): void {
    const healthFactor = this.getAccountHealthFactor(account);
    if (!isHealthy(healthFactor)) {
      throw new HealthFactorBelowMinimumError(healthFactor);
    }
  }
}
