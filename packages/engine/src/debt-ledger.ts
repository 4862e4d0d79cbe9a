import { InsufficientBalanceError, ZeroAmountError } from "./errors";

export type DebtCheckpoint = ReadonlyMap<string, bigint>;

/** Outstanding debt per account, in pegged units (18 decimals). */
export class DebtLedger {
  private debts = new Map<string, bigint>();

  debtOf(account: string): bigint {
    return this.debts.get(account) ?? 0n;
  }

  totalDebt(): bigint {
    let total = 0n;
    for (const debt of this.debts.values()) total += debt;
    return total;
  }

  accounts(): string[] {
    return [...this.debts.keys()];
  }

  increaseDebt(account: string, amount: bigint): bigint {
    if (amount <= 0n) throw new ZeroAmountError();
    const next = this.debtOf(account) + amount;
    this.debts.set(account, next);
    return next;
  }

  decreaseDebt(account: string, amount: bigint): bigint {
    if (amount <= 0n) throw new ZeroAmountError();
    const current = this.debtOf(account);
    if (amount > current) throw new InsufficientBalanceError(amount, current);

    const next = current - amount;
    if (next === 0n) this.debts.delete(account);
    else this.debts.set(account, next);
    return next;
  }

  checkpoint(): DebtCheckpoint {
    return new Map(this.debts);
  }

  restore(checkpoint: DebtCheckpoint): void {
    this.debts = new Map(checkpoint);
  }
}
