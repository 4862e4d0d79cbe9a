import { InsufficientBalanceError, ZeroAmountError } from "./errors";

export type CollateralCheckpoint = ReadonlyMap<string, ReadonlyMap<string, bigint>>;

/**
 * Per-account collateral balances, keyed account -> asset -> raw amount.
 *
 * Owned by one engine instance. Entries that fall to zero are removed, so a
 * missing entry and a zero balance are the same thing.
 */
export class CollateralLedger {
  private balances = new Map<string, Map<string, bigint>>();

  balanceOf(account: string, asset: string): bigint {
    return this.balances.get(account)?.get(asset) ?? 0n;
  }

  /** Asset ids with a non-zero balance for `account`. */
  assetsOf(account: string): string[] {
    return [...(this.balances.get(account)?.keys() ?? [])];
  }

  accounts(): string[] {
    return [...this.balances.keys()];
  }

  deposit(account: string, asset: string, amount: bigint): bigint {
    if (amount <= 0n) throw new ZeroAmountError();

    let entries = this.balances.get(account);
    if (!entries) {
      entries = new Map();
      this.balances.set(account, entries);
    }
    const next = (entries.get(asset) ?? 0n) + amount;
    entries.set(asset, next);
    return next;
  }

  withdraw(account: string, asset: string, amount: bigint): bigint {
    if (amount <= 0n) throw new ZeroAmountError();

    const current = this.balanceOf(account, asset);
    if (amount > current) throw new InsufficientBalanceError(amount, current);

    const next = current - amount;
    const entries = this.balances.get(account);
    if (entries) {
      if (next === 0n) {
        entries.delete(asset);
        if (entries.size === 0) this.balances.delete(account);
      } else {
        entries.set(asset, next);
      }
    }
    return next;
  }

  checkpoint(): CollateralCheckpoint {
    const copy = new Map<string, ReadonlyMap<string, bigint>>();
    for (const [account, entries] of this.balances) {
      copy.set(account, new Map(entries));
    }
    return copy;
  }

  restore(checkpoint: CollateralCheckpoint): void {
    const balances = new Map<string, Map<string, bigint>>();
    for (const [account, entries] of checkpoint) {
      balances.set(account, new Map(entries));
    }
    this.balances = balances;
  }
}
