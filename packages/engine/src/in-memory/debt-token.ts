import { PRECISION_DECIMALS } from "../constants";
import type { DebtToken } from "../interfaces";
import { InMemoryToken } from "./token";

/**
 * Pegged debt token, 18 decimals. Burns only ever destroy tokens the
 * custody account holds.
 */
export class InMemoryDebtToken extends InMemoryToken implements DebtToken {
  constructor(id: string, custody: string) {
    super(id, PRECISION_DECIMALS, custody);
  }

  burn(amount: bigint): void {
    if (amount <= 0n) throw new RangeError(`${this.id}: burn amount must be positive`);
    this.burnFrom(this.custody, amount);
  }
}
