/**
 * keeper.ts
 *
 * The keeper runs one duty loop (every PRICE_INTERVAL_MS):
 *
 *  1. Price push
 *     Fetches spot prices from RedStone and pushes them into the engine's
 *     price feeds, stamped with the current time.
 *
 *  2. Liquidation sweep
 *     Scans every indebted account, and for each one below the minimum
 *     health factor covers as much debt as the keeper's own debt-token
 *     balance allows, collecting the seized collateral plus bonus.
 *
 * A failed price push still lets the sweep run against the previous prices;
 * the engine refuses to value anything once they go stale.
 */

import type { LiquidationResult } from "@plinth/types";
import { systemClock, type Clock, type CollateralEngine, type PushPriceFeed } from "@plinth/engine";
import { executeLiquidation, planLiquidation } from "./liquidator";
import { logger } from "./logger";
import { PositionMonitor } from "./monitor";
import type { MarketPrices } from "./prices";

// -----------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------

export interface KeeperOptions {
  engine: CollateralEngine;
  /** RedStone feed symbol -> engine price feed to push into. */
  feeds: ReadonlyMap<string, PushPriceFeed>;
  /** Engine account the keeper liquidates from. */
  address: string;
  fetchPrices: (feeds: readonly string[]) => Promise<MarketPrices>;
  intervalMs: number;
  /** Per-call debt cap, 0 = uncapped. */
  maxDebtToCover?: bigint;
  clock?: Clock;
}

export interface SweepReport {
  scanned: number;
  atRisk: number;
  liquidated: LiquidationResult[];
  failed: { account: string; reason: string }[];
}

// -----------------------------------------------------------------------
// Keeper class
// -----------------------------------------------------------------------

export class Keeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private readonly monitor: PositionMonitor;
  private readonly clock: Clock;

  constructor(private readonly options: KeeperOptions) {
    this.monitor = new PositionMonitor(options.engine);
    this.clock = options.clock ?? systemClock;
  }

  // -----------------------------------------------------------------------
  // Public: lifecycle
  // -----------------------------------------------------------------------

  start(): void {
    logger.info(`Keeper starting — account: ${this.options.address}`);
    logger.info(`Interval: ${this.options.intervalMs / 1000}s, feeds: ${[...this.options.feeds.keys()].join(", ")}`);

    // Run immediately on start, then on a timer
    void this.runTick();
    this.timer = setInterval(() => void this.runTick(), this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    logger.info("Keeper stopped.");
  }

  // -----------------------------------------------------------------------
  // Public: one round
  // -----------------------------------------------------------------------

  async tick(): Promise<SweepReport> {
    try {
      await this.pushPrices();
    } catch (err) {
      logger.error(`Price push failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    return this.sweep();
  }

  /** Liquidate every at-risk position, worst first. */
  sweep(): SweepReport {
    const positions = this.monitor.scan();
    const atRisk = positions.filter((p) => p.isAtRisk);
    const report: SweepReport = { scanned: positions.length, atRisk: atRisk.length, liquidated: [], failed: [] };

    for (const position of atRisk) {
      try {
        const plan = planLiquidation(
          this.options.engine,
          this.options.address,
          position,
          this.options.maxDebtToCover
        );
        if (!plan) {
          logger.info(`Nothing to cover for ${position.account}.`);
          continue;
        }
        const result = executeLiquidation(this.options.engine, this.options.address, plan);
        report.liquidated.push(result);
      } catch (err) {
        // Log and continue; one position failing should not block the rest
        const reason = err instanceof Error ? err.message : String(err);
        logger.error(`Liquidation of ${position.account} failed: ${reason}`);
        report.failed.push({ account: position.account, reason });
      }
    }

    logger.info(
      `Sweep — ${report.scanned} positions, ${report.atRisk} at risk, ` +
      `${report.liquidated.length} liquidated, ${report.failed.length} failed.`
    );
    return report;
  }

  // -----------------------------------------------------------------------
  // Price loop
  // -----------------------------------------------------------------------

  private async runTick(): Promise<void> {
    if (this.running) {
      logger.warn("Previous tick still running; skipping.");
      return;
    }
    this.running = true;
    try {
      await this.tick();
    } catch (err) {
      logger.error(`Tick failed: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.running = false;
    }
  }

  private async pushPrices(): Promise<void> {
    const symbols = [...this.options.feeds.keys()];
    const prices = await this.options.fetchPrices(symbols);
    const now = this.clock();

    for (const [symbol, feed] of this.options.feeds) {
      const price: bigint | undefined = prices[symbol];
      if (price === undefined) {
        logger.warn(`No price returned for ${symbol}; feed left unchanged.`);
        continue;
      }
      feed.push(price, now);
    }
  }
}
