import {
  CollateralEngine,
  InMemoryDebtToken,
  InMemoryToken,
  PushPriceFeed,
  createEngineLogger,
} from "@plinth/engine";

// -----------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------

export const E18 = 10n ** 18n;          // 1 whole unit, 18 decimals
export const SAT = 100_000_000n;        // 1 whole unit, 8 decimals
export const NOW = 1_700_000_000n;      // fixed clock, unix seconds

/** USD price with 8 oracle decimals. */
export function usd8(dollars: bigint): bigint {
  return dollars * 100_000_000n;
}

export const CUSTODY = "engine-custody";
export const USER = "ST1USER";
export const LIQUIDATOR = "ST2LIQUIDATOR";
export const OTHER = "ST3OTHER";

export const silentLogger = createEngineLogger("test", "error");

// -----------------------------------------------------------------------
// Fixture
// -----------------------------------------------------------------------

export interface Fixture {
  engine: CollateralEngine;
  weth: InMemoryToken;
  wbtc: InMemoryToken;
  debtToken: InMemoryDebtToken;
  ethFeed: PushPriceFeed;
  btcFeed: PushPriceFeed;
  clock: { now: bigint };
}

/**
 * WETH (18 decimals, $2000) and WBTC (8 decimals, $30000), both priced at
 * NOW, with a 3h heartbeat.
 */
export function setup(): Fixture {
  const clock = { now: NOW };
  const weth = new InMemoryToken("WETH", 18, CUSTODY);
  const wbtc = new InMemoryToken("WBTC", 8, CUSTODY);
  const ethFeed = new PushPriceFeed("ETH", usd8(2000n), NOW);
  const btcFeed = new PushPriceFeed("BTC", usd8(30_000n), NOW);
  const debtToken = new InMemoryDebtToken("pUSD", CUSTODY);

  const engine = new CollateralEngine({
    collateralTokens: [weth, wbtc],
    priceFeeds: [ethFeed, btcFeed],
    debtToken,
    custody: CUSTODY,
    clock: () => clock.now,
    logger: silentLogger,
  });

  return { engine, weth, wbtc, debtToken, ethFeed, btcFeed, clock };
}

/** Mint `amount` of `token` to `account` and approve it all to custody. */
export function fund(token: InMemoryToken, account: string, amount: bigint): void {
  token.mint(account, amount);
  token.approve(account, token.allowance(account) + amount);
}

/** Deposit `collateral` WETH and mint `debt`, funding the account first. */
export function openPosition(f: Fixture, account: string, collateral: bigint, debt: bigint): void {
  fund(f.weth, account, collateral);
  f.engine.depositCollateralAndMintDebt(account, "WETH", collateral, debt);
}
