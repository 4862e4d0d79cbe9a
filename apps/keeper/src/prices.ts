/**
 * prices.ts
 *
 * Fetches spot prices from the RedStone oracle network and converts them to
 * the fixed-point format the engine's price feeds carry:
 *
 *   Price — 8 decimal places: $1.00 USD = 100_000_000n
 */

import { requestDataPackages } from "@redstone-finance/sdk";
import { DEFAULT_ORACLE_DECIMALS } from "@plinth/engine";
import { logger } from "./logger";

const ORACLE_SCALE = 10 ** DEFAULT_ORACLE_DECIMALS;

/** Feed symbol -> USD price scaled to 8 decimals. */
export type MarketPrices = Record<string, bigint>;

/** Pull the latest prices for `feeds` from RedStone. */
export async function fetchMarketPrices(
  feeds: readonly string[],
  dataServiceId: string
): Promise<MarketPrices> {
  const packages = await requestDataPackages({
    dataServiceId,
    uniqueSignersCount: 1,
    dataFeeds: [...feeds],
  });

  const prices: MarketPrices = {};
  for (const feed of feeds) {
    const value = extractValue(packages[feed], feed);
    prices[feed] = toOraclePrice(value);
  }

  logger.info(
    `Prices fetched — ${feeds.map((f) => `${f}: $${(Number(prices[f]) / ORACLE_SCALE).toFixed(2)}`).join(", ")}`
  );
  return prices;
}

/** USD float -> 8-decimal fixed point, rounded to the nearest unit. */
export function toOraclePrice(usd: number): bigint {
  if (!Number.isFinite(usd) || usd <= 0) {
    throw new Error(`Invalid USD price: ${usd}`);
  }
  return BigInt(Math.round(usd * ORACLE_SCALE));
}

// -----------------------------------------------------------------------
// Internal helpers
// -----------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function hasToNumber(value: unknown): value is { toNumber(): number } {
  return isRecord(value) && typeof value.toNumber === "function";
}

/** Numeric value of the first data point of the first package. */
export function extractValue(pkgs: unknown, feed: string): number {
  if (!Array.isArray(pkgs) || pkgs.length === 0) {
    throw new Error(`RedStone: no packages returned for ${feed}`);
  }
  const pkg: unknown = pkgs[0];
  const points = isRecord(pkg) ? pkg.dataPoints : undefined;
  const point: unknown = Array.isArray(points) ? points[0] : undefined;
  const raw = isRecord(point) ? point.value : undefined;

  if (typeof raw === "number") return raw;
  if (hasToNumber(raw)) return raw.toNumber();
  throw new Error(`RedStone: missing value for ${feed}`);
}
