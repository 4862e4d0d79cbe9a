/**
 * Plinth Keeper v0.2.0
 *
 * Responsibilities:
 *   - Push RedStone spot prices into the engine's price feeds.
 *   - Liquidate every position below the minimum health factor, paying
 *     with the keeper's own debt tokens.
 *
 * The keeper does not own an engine. The host that runs the engine hands it
 * over together with the price feeds the keeper may push into, funds the
 * keeper account with debt tokens and approves the engine to pull them.
 *
 * Usage:
 *   const keeper = createKeeper({ engine, feeds });
 *   keeper.start();
 *   ...
 *   keeper.stop();
 *
 * Environment variables (see .env.example):
 *   KEEPER_PRIVATE_KEY, PLINTH_NETWORK, REDSTONE_DATA_SERVICE_ID,
 *   PRICE_FEEDS, PRICE_INTERVAL_MS, PRICE_HEARTBEAT_SECONDS,
 *   MAX_DEBT_TO_COVER, LOG_LEVEL
 */

import type { CollateralEngine, PushPriceFeed } from "@plinth/engine";
import { config } from "./config";
import { getKeeperAddress } from "./identity";
import { Keeper, type KeeperOptions } from "./keeper";
import { logger } from "./logger";
import { fetchMarketPrices } from "./prices";

export interface KeeperHost {
  engine: CollateralEngine;
  /** Feed symbol -> engine price feed; must cover every symbol in PRICE_FEEDS. */
  feeds: ReadonlyMap<string, PushPriceFeed>;
}

export type KeeperOverrides = Partial<Omit<KeeperOptions, "engine" | "feeds">>;

/**
 * Keeper for a host-supplied engine. Settings come from the environment
 * unless overridden; the account defaults to the address derived from
 * KEEPER_PRIVATE_KEY.
 */
export function createKeeper(host: KeeperHost, overrides: KeeperOverrides = {}): Keeper {
  const feeds = new Map<string, PushPriceFeed>();
  for (const symbol of config.prices.feeds) {
    const feed = host.feeds.get(symbol);
    if (!feed) throw new Error(`No price feed supplied for configured symbol ${symbol}`);
    feeds.set(symbol, feed);
  }

  const address = overrides.address ?? getKeeperAddress();
  logger.info(`Network: ${config.network} | Feeds: ${[...feeds.keys()].join(", ")} | Account: ${address}`);

  return new Keeper({
    engine: host.engine,
    feeds,
    address,
    fetchPrices:
      overrides.fetchPrices ??
      ((symbols) => fetchMarketPrices(symbols, config.prices.dataServiceId)),
    intervalMs: overrides.intervalMs ?? config.prices.intervalMs,
    maxDebtToCover: overrides.maxDebtToCover ?? config.liquidation.maxDebtToCover,
    clock: overrides.clock,
  });
}

export { config } from "./config";
export { getKeeperAddress } from "./identity";
export { Keeper } from "./keeper";
export type { KeeperOptions, SweepReport } from "./keeper";
export { executeLiquidation, planLiquidation } from "./liquidator";
export { PositionMonitor } from "./monitor";
export { extractValue, fetchMarketPrices, toOraclePrice } from "./prices";
export type { MarketPrices } from "./prices";
export { CUSTODY_ACCOUNT, DEBT_TOKEN_ID, createInProcessEngine } from "./setup";
export type { InProcessEngine } from "./setup";
