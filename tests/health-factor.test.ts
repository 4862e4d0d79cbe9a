import { describe, it, expect } from "vitest";
import {
  calculateHealthFactor,
  isHealthy,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
} from "@plinth/engine";
import { E18, USER, fund, openPosition, setup } from "./helpers";

describe("calculateHealthFactor", () => {
  it("is 1.0 at exactly 200% collateralization", () => {
    expect(calculateHealthFactor(1000n * E18, 2000n * E18)).toBe(E18);
  });

  it("is 2.0 at 400% collateralization", () => {
    expect(calculateHealthFactor(1000n * E18, 4000n * E18)).toBe(2n * E18);
  });

  it("returns MAX for zero debt, whatever the collateral", () => {
    expect(calculateHealthFactor(0n, 0n)).toBe(MAX_HEALTH_FACTOR);
    expect(calculateHealthFactor(0n, 123n * E18)).toBe(MAX_HEALTH_FACTOR);
  });

  it("halves collateral before scaling (integer truncation)", () => {
    // (7 / 2) = 3, then 3 * 1e18 / 2
    expect(calculateHealthFactor(2n, 7n)).toBe((3n * E18) / 2n);
  });

  it("matches (C/2) * 1e18 / D over a range of values", () => {
    const cases: [bigint, bigint][] = [
      [1n, 1n],
      [3n * E18, 5n * E18],
      [1001n * E18, 2000n * E18],
      [999_999n, 10n ** 30n],
    ];
    for (const [debt, collateral] of cases) {
      expect(calculateHealthFactor(debt, collateral)).toBe(((collateral / 2n) * E18) / debt);
    }
  });

  it("no collateral with debt is a health factor of zero", () => {
    expect(calculateHealthFactor(1n, 0n)).toBe(0n);
  });
});

describe("isHealthy", () => {
  it("treats exactly 1.0 as healthy", () => {
    expect(isHealthy(MIN_HEALTH_FACTOR)).toBe(true);
    expect(isHealthy(MIN_HEALTH_FACTOR - 1n)).toBe(false);
  });
});

describe("getAccountHealthFactor", () => {
  it("is MAX for an account that never interacted", () => {
    const { engine } = setup();
    expect(engine.getAccountHealthFactor(USER)).toBe(MAX_HEALTH_FACTOR);
  });

  it("is MAX with collateral and no debt", () => {
    const f = setup();
    fund(f.weth, USER, E18);
    f.engine.depositCollateral(USER, "WETH", E18);
    expect(f.engine.getAccountHealthFactor(USER)).toBe(MAX_HEALTH_FACTOR);
  });

  it("sums every registered asset", () => {
    const f = setup();
    fund(f.wbtc, USER, 100_000_000n);
    f.engine.depositCollateral(USER, "WBTC", 100_000_000n); // $30,000
    openPosition(f, USER, 5n * E18, 10_000n * E18);         // + $10,000

    // (40,000 / 2) / 10,000
    expect(f.engine.getAccountHealthFactor(USER)).toBe(2n * E18);
  });

  it("falls with the collateral price", () => {
    const f = setup();
    openPosition(f, USER, 10n * E18, 10_000n * E18);
    expect(f.engine.getAccountHealthFactor(USER)).toBe(E18);

    f.ethFeed.push(100_000_000_000n, f.clock.now); // $1000
    expect(f.engine.getAccountHealthFactor(USER)).toBe(E18 / 2n);
  });
});
