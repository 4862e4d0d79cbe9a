/**
 * Property tests over random operation sequences.
 *
 * Three actors deposit, mint, redeem, burn and liquidate one another while
 * the ETH price wanders between $1000 and $2000. After every step:
 *   - total collateral value covers total debt
 *   - custody holds exactly what the collateral ledger records
 *   - the debt token's supply equals the recorded debt
 * and every rejected operation leaves all of the above untouched.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { EngineError } from "@plinth/engine";
import { CUSTODY, E18, fund, setup, usd8, type Fixture } from "./helpers";

const NUM_RUNS = 60;
const ACTORS = ["ST1ALICE", "ST2BOB", "ST3CAROL"] as const;

type Actor = (typeof ACTORS)[number];

type Operation =
  | { kind: "deposit"; actor: Actor; amount: bigint }
  | { kind: "redeem"; actor: Actor; amount: bigint }
  | { kind: "mint"; actor: Actor; amount: bigint }
  | { kind: "burn"; actor: Actor; amount: bigint }
  | { kind: "liquidate"; actor: Actor; target: Actor; amount: bigint }
  | { kind: "setPrice"; dollars: bigint };

// =====================================================================
// Generators
// =====================================================================

const actor = fc.constantFrom(...ACTORS);
const collateralAmount = fc.bigInt({ min: 1n, max: 20n * E18 });
const debtAmount = fc.bigInt({ min: 1n, max: 20_000n * E18 });

const operation: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), actor, amount: collateralAmount }),
  fc.record({ kind: fc.constant("redeem" as const), actor, amount: collateralAmount }),
  fc.record({ kind: fc.constant("mint" as const), actor, amount: debtAmount }),
  fc.record({ kind: fc.constant("burn" as const), actor, amount: debtAmount }),
  fc.record({ kind: fc.constant("liquidate" as const), actor, target: actor, amount: debtAmount }),
  fc.record({ kind: fc.constant("setPrice" as const), dollars: fc.bigInt({ min: 1_000n, max: 2_000n }) })
);

// =====================================================================
// Harness
// =====================================================================

function prepare(): Fixture {
  const f = setup();
  for (const name of ACTORS) {
    fund(f.weth, name, 100n * E18);
    f.debtToken.approve(name, 2n ** 255n);
  }
  return f;
}

function apply(f: Fixture, op: Operation): void {
  switch (op.kind) {
    case "deposit":
      return f.engine.depositCollateral(op.actor, "WETH", op.amount);
    case "redeem":
      return f.engine.redeemCollateral(op.actor, "WETH", op.amount);
    case "mint":
      return f.engine.mintDebt(op.actor, op.amount);
    case "burn":
      return f.engine.burnDebt(op.actor, op.amount);
    case "liquidate":
      f.engine.liquidate(op.actor, "WETH", op.target, op.amount);
      return;
    case "setPrice":
      f.ethFeed.push(usd8(op.dollars), f.clock.now);
      return;
  }
}

/** Everything an operation may touch, as plain values. */
function snapshot(f: Fixture): string[] {
  const rows = ACTORS.map((name) =>
    [
      name,
      f.engine.getAccountCollateralBalance(name, "WETH"),
      f.engine.getAccountInformation(name).totalDebt,
      f.weth.balanceOf(name),
      f.debtToken.balanceOf(name),
    ].join(":")
  );
  rows.push(`custody:${f.weth.balanceOf(CUSTODY)}:${f.debtToken.balanceOf(CUSTODY)}`);
  rows.push(`supply:${f.debtToken.totalSupply()}`);
  return rows;
}

function checkInvariants(f: Fixture): void {
  let collateralValue = 0n;
  let recordedCollateral = 0n;
  for (const name of ACTORS) {
    collateralValue += f.engine.getAccountCollateralValue(name);
    recordedCollateral += f.engine.getAccountCollateralBalance(name, "WETH");
  }

  expect(collateralValue >= f.engine.getTotalDebt()).toBe(true);
  expect(f.weth.balanceOf(CUSTODY)).toBe(recordedCollateral);
  expect(f.debtToken.totalSupply()).toBe(f.engine.getTotalDebt());
  expect(f.debtToken.balanceOf(CUSTODY)).toBe(0n);
}

// =====================================================================
// Properties
// =====================================================================

describe("engine invariants", () => {
  it("hold after every operation in a random sequence", () => {
    fc.assert(
      fc.property(fc.array(operation, { minLength: 1, maxLength: 40 }), (ops) => {
        const f = prepare();
        for (const op of ops) {
          try {
            apply(f, op);
          } catch (err) {
            if (!(err instanceof EngineError)) throw err;
          }
          checkInvariants(f);
        }
      }),
      { numRuns: NUM_RUNS }
    );
  });

  it("rejected operations leave no trace", () => {
    fc.assert(
      fc.property(fc.array(operation, { minLength: 1, maxLength: 40 }), (ops) => {
        const f = prepare();
        for (const op of ops) {
          const before = snapshot(f);
          try {
            apply(f, op);
          } catch (err) {
            if (!(err instanceof EngineError)) throw err;
            expect(snapshot(f)).toEqual(before);
          }
        }
      }),
      { numRuns: NUM_RUNS }
    );
  });

  it("a health factor only falls below 1.0 through a price move", () => {
    fc.assert(
      fc.property(fc.array(operation, { minLength: 1, maxLength: 40 }), (ops) => {
        const f = prepare();
        for (const op of ops) {
          const underwater = new Set(
            ACTORS.filter((name) => f.engine.getAccountHealthFactor(name) < E18)
          );
          try {
            apply(f, op);
          } catch (err) {
            if (!(err instanceof EngineError)) throw err;
          }
          if (op.kind === "setPrice") continue;
          for (const name of ACTORS) {
            if (underwater.has(name)) continue;
            expect(f.engine.getAccountHealthFactor(name) >= E18).toBe(true);
          }
        }
      }),
      { numRuns: NUM_RUNS }
    );
  });
});
