/**
 * setup.ts
 *
 * Wires an in-process engine: one in-memory collateral token and one push
 * price feed per RedStone feed symbol, plus the pegged debt token. Hosts
 * without token contracts of their own run the engine on these and pass
 * `{ engine, feeds }` to createKeeper.
 */

import {
  CollateralEngine,
  InMemoryDebtToken,
  InMemoryToken,
  PushPriceFeed,
  createEngineLogger,
} from "@plinth/engine";
import { config } from "./config";

/** Native decimals of the collateral backing each feed; 18 unless listed. */
const TOKEN_DECIMALS: Readonly<Record<string, number>> = {
  BTC: 8,
  USDC: 6,
};

export const CUSTODY_ACCOUNT = "plinth-engine-custody";
export const DEBT_TOKEN_ID = "pUSD";

export interface InProcessEngine {
  engine: CollateralEngine;
  tokens: Map<string, InMemoryToken>;
  feeds: Map<string, PushPriceFeed>;
  debtToken: InMemoryDebtToken;
}

export function createInProcessEngine(
  symbols: readonly string[] = config.prices.feeds,
  priceHeartbeat: bigint = config.prices.heartbeatSeconds
): InProcessEngine {
  const tokens = new Map<string, InMemoryToken>();
  const feeds = new Map<string, PushPriceFeed>();

  for (const symbol of symbols) {
    tokens.set(symbol, new InMemoryToken(symbol, TOKEN_DECIMALS[symbol] ?? 18, CUSTODY_ACCOUNT));
    // No price until the first push; valuations of this asset fail until then.
    feeds.set(symbol, new PushPriceFeed(symbol, 0n, 0n));
  }

  const debtToken = new InMemoryDebtToken(DEBT_TOKEN_ID, CUSTODY_ACCOUNT);
  const engine = new CollateralEngine({
    collateralTokens: [...tokens.values()],
    priceFeeds: [...feeds.values()],
    debtToken,
    custody: CUSTODY_ACCOUNT,
    priceHeartbeat,
    logger: createEngineLogger("ENGINE"),
  });

  return { engine, tokens, feeds, debtToken };
}
