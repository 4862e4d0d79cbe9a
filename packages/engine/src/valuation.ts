/**
 * Collateral valuation against the registered price feeds.
 *
 *   usd   = toCanonical(raw, assetDecimals) * toCanonical(price, oracleDecimals) / 1e18
 *   raw   = fromCanonical(usd * 1e18 / toCanonical(price, oracleDecimals), assetDecimals)
 *
 * An 8-decimal asset is scaled up by 1e10 before pricing.
 */

import type { CollateralAsset } from "./asset-registry";
import { DEFAULT_PRICE_HEARTBEAT, PRECISION } from "./constants";
import { InvalidPriceError, StalePriceDataError } from "./errors";
import { fromCanonical, mulDiv, toCanonical } from "./fixed-point";
import { systemClock, type Clock } from "./interfaces";

export interface ValuationOptions {
  /** Max age of a price in seconds. */
  heartbeat?: bigint;
  clock?: Clock;
}

export class Valuation {
  private readonly heartbeat: bigint;
  private readonly clock: Clock;

  constructor(options: ValuationOptions = {}) {
    this.heartbeat = options.heartbeat ?? DEFAULT_PRICE_HEARTBEAT;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Current price of one whole unit of `asset` in canonical USD.
   * Throws StalePriceDataError past the heartbeat, InvalidPriceError for a
   * non-positive answer.
   */
  canonicalPrice(asset: CollateralAsset): bigint {
    const { price, updatedAt } = asset.oracle.latestPrice();
    const now = this.clock();
    if (now > updatedAt && now - updatedAt > this.heartbeat) {
      throw new StalePriceDataError(asset.id, updatedAt, now);
    }
    if (price <= 0n) throw new InvalidPriceError(asset.id, price);
    return toCanonical(price, asset.oracle.decimals());
  }

  usdValue(asset: CollateralAsset, rawAmount: bigint): bigint {
    if (rawAmount === 0n) return 0n;
    const price = this.canonicalPrice(asset);
    return mulDiv(toCanonical(rawAmount, asset.decimals), price, PRECISION);
  }

  tokenAmountFromUsd(asset: CollateralAsset, usdAmount: bigint): bigint {
    const price = this.canonicalPrice(asset);
    return fromCanonical(mulDiv(usdAmount, PRECISION, price), asset.decimals);
  }
}
