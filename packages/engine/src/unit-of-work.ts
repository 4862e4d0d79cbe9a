import type { CollateralLedger } from "./collateral-ledger";
import type { DebtLedger } from "./debt-ledger";
import { CompensationFailedError } from "./errors";
import type { Logger } from "./logger";

/**
 * Order in which deferred effects run at commit:
 *   pull   - move assets from a caller into custody
 *   settle - mint or burn the debt token
 *   payout - move assets out of custody
 * Payouts run last because they cannot be compensated.
 */
export type EffectStage = "pull" | "settle" | "payout";

const STAGE_ORDER: readonly EffectStage[] = ["pull", "settle", "payout"];

export interface Effect {
  stage: EffectStage;
  label: string;
  /** Throws when the collaborator refuses. */
  apply(): void;
  /** Reverses a successful apply() if a later effect fails. */
  compensate?(): void;
  /** Ledger write re-applied after rollback when compensate() itself fails. */
  retain?(): void;
}

/**
 * One engine call. Ledger writes happen immediately against the live
 * ledgers; collaborator calls are deferred until the body (and every check
 * in it) has returned. Any failure restores both ledgers and compensates the
 * effects already applied, newest first. If a compensation fails, the
 * effect's `retain` write is kept and the caller gets a
 * CompensationFailedError wrapping the original failure.
 */
export class UnitOfWork {
  private readonly pending: Effect[] = [];

  constructor(
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
    private readonly logger: Logger
  ) {}

  defer(effect: Effect): void {
    this.pending.push(effect);
  }

  execute<T>(operation: string, body: (work: UnitOfWork) => T): T {
    const collateralCheckpoint = this.collateral.checkpoint();
    const debtCheckpoint = this.debt.checkpoint();
    const applied: Effect[] = [];

    try {
      const result = body(this);
      for (const stage of STAGE_ORDER) {
        for (const effect of this.pending) {
          if (effect.stage !== stage) continue;
          effect.apply();
          applied.push(effect);
        }
      }
      this.logger.debug(`${operation} committed (${applied.length} effects)`);
      return result;
    } catch (err) {
      const unreversed = this.compensate(operation, applied);
      this.collateral.restore(collateralCheckpoint);
      this.debt.restore(debtCheckpoint);
      for (const effect of unreversed) effect.retain?.();
      this.logger.debug(`${operation} rolled back: ${err instanceof Error ? err.message : String(err)}`);
      if (unreversed.length > 0) {
        throw new CompensationFailedError(operation, unreversed.map((e) => e.label), err);
      }
      throw err;
    }
  }

  /** Returns the effects whose compensation threw. */
  private compensate(operation: string, applied: Effect[]): Effect[] {
    const unreversed: Effect[] = [];
    for (const effect of [...applied].reverse()) {
      if (!effect.compensate) continue;
      try {
        effect.compensate();
      } catch (err) {
        unreversed.push(effect);
        this.logger.error(
          `${operation}: could not compensate "${effect.label}": ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
    return unreversed;
  }
}
