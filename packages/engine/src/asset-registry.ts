import { InvalidConfigurationError, UnsupportedAssetError } from "./errors";
import type { FungibleAsset, PriceOracle } from "./interfaces";

export interface CollateralAsset {
  id: string;
  token: FungibleAsset;
  oracle: PriceOracle;
  /** Native precision of the token's raw amounts. */
  decimals: number;
}

/**
 * The supported collateral set. Built once from two parallel lists and
 * never changed afterwards.
 */
export class AssetRegistry {
  private readonly assets: ReadonlyMap<string, CollateralAsset>;

  constructor(tokens: readonly FungibleAsset[], oracles: readonly PriceOracle[]) {
    if (tokens.length !== oracles.length) {
      throw new InvalidConfigurationError(
        `${tokens.length} collateral tokens but ${oracles.length} price feeds`
      );
    }

    const assets = new Map<string, CollateralAsset>();
    tokens.forEach((token, i) => {
      if (assets.has(token.id)) {
        throw new InvalidConfigurationError(`duplicate collateral asset "${token.id}"`);
      }
      const decimals = token.decimals();
      if (!Number.isInteger(decimals) || decimals < 0) {
        throw new InvalidConfigurationError(`asset "${token.id}" reports ${decimals} decimals`);
      }
      assets.set(token.id, { id: token.id, token, oracle: oracles[i], decimals });
    });
    this.assets = assets;
  }

  /** Throws UnsupportedAssetError for anything not registered. */
  get(id: string): CollateralAsset {
    const asset = this.assets.get(id);
    if (!asset) throw new UnsupportedAssetError(id);
    return asset;
  }

  has(id: string): boolean {
    return this.assets.has(id);
  }

  ids(): string[] {
    return [...this.assets.keys()];
  }

  all(): CollateralAsset[] {
    return [...this.assets.values()];
  }
}
