/**
 * Collaborator contracts consumed by the engine.
 *
 * The engine treats a `false` return exactly like a thrown error: the
 * enclosing operation aborts and rolls back. Implementations must be
 * synchronous; anything they call back into a guarded engine operation
 * is rejected.
 */

/**
 * Deposit/withdraw primitive for one collateral asset, seen from the
 * engine's custody account.
 */
export interface FungibleAsset {
  /** Identifier the engine registers the asset under. */
  readonly id: string;

  /** Pull `amount` from `from` into engine custody. */
  transferIn(from: string, amount: bigint): boolean;

  /** Pay `amount` out of engine custody to `to`. */
  transferOut(to: string, amount: bigint): boolean;

  balanceOf(owner: string): bigint;

  /** Native decimal precision of raw amounts. */
  decimals(): number;
}

/**
 * The pegged synthetic asset. Minting is reserved to the engine.
 */
export interface DebtToken {
  readonly id: string;

  mint(to: string, amount: bigint): boolean;

  /** Destroy `amount` held in engine custody. Throws if custody holds less. */
  burn(amount: bigint): void;

  /** Pull `amount` from `from` into engine custody. */
  transferIn(from: string, amount: bigint): boolean;

  /** Return `amount` from engine custody to `to`. */
  transferOut(to: string, amount: bigint): boolean;

  balanceOf(owner: string): bigint;
}

export interface PriceData {
  /** Signed fixed-point price with `decimals()` fractional digits. */
  price: bigint;
  /** Unix seconds. */
  updatedAt: bigint;
}

export interface PriceOracle {
  latestPrice(): PriceData;
  decimals(): number;
}

/** Seconds since the unix epoch. */
export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));
