import type { FungibleAsset } from "../interfaces";

/**
 * Balance-and-allowance token living in process memory.
 *
 * `custody` is the engine's account: transferIn pulls from an owner into it
 * (spending the owner's approval), transferOut pays out of it.
 */
export class InMemoryToken implements FungibleAsset {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private supply = 0n;

  constructor(
    readonly id: string,
    private readonly tokenDecimals: number,
    readonly custody: string
  ) {}

  decimals(): number {
    return this.tokenDecimals;
  }

  balanceOf(owner: string): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  /** Approval granted by `owner` to the custody account. */
  allowance(owner: string): bigint {
    return this.allowances.get(owner) ?? 0n;
  }

  approve(owner: string, amount: bigint): void {
    if (amount < 0n) throw new RangeError("Negative approval");
    this.allowances.set(owner, amount);
  }

  mint(to: string, amount: bigint): boolean {
    if (amount <= 0n) return false;
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
    return true;
  }

  transfer(from: string, to: string, amount: bigint): boolean {
    if (amount < 0n || this.balanceOf(from) < amount) return false;
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  transferIn(from: string, amount: bigint): boolean {
    const allowed = this.allowance(from);
    if (allowed < amount) return false;
    if (!this.transfer(from, this.custody, amount)) return false;
    this.allowances.set(from, allowed - amount);
    return true;
  }

  transferOut(to: string, amount: bigint): boolean {
    return this.transfer(this.custody, to, amount);
  }

  protected burnFrom(owner: string, amount: bigint): void {
    const balance = this.balanceOf(owner);
    if (amount < 0n || balance < amount) {
      throw new RangeError(`${this.id}: cannot burn ${amount} from ${owner} holding ${balance}`);
    }
    this.balances.set(owner, balance - amount);
    this.supply -= amount;
  }
}
