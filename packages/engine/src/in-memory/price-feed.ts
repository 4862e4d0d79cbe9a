import { DEFAULT_ORACLE_DECIMALS } from "../constants";
import type { PriceData, PriceOracle } from "../interfaces";

/**
 * Price feed that holds whatever was last pushed to it. The keeper pushes
 * market prices here; tests push fixed ones.
 */
export class PushPriceFeed implements PriceOracle {
  private latest: PriceData;

  constructor(
    readonly symbol: string,
    price: bigint,
    updatedAt: bigint,
    private readonly priceDecimals: number = DEFAULT_ORACLE_DECIMALS
  ) {
    this.latest = { price, updatedAt };
  }

  push(price: bigint, updatedAt: bigint): void {
    this.latest = { price, updatedAt };
  }

  latestPrice(): PriceData {
    return { ...this.latest };
  }

  decimals(): number {
    return this.priceDecimals;
  }
}
