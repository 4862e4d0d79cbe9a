import "dotenv/config";

function readBigInt(name: string, fallback: bigint): bigint {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  return BigInt(raw);
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readList(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}

export const config = {
  network: process.env.PLINTH_NETWORK ?? "devnet",

  // Hex-encoded Stacks private key for the keeper wallet. The derived
  // address is the account the keeper liquidates from.
  keeperPrivateKey: process.env.KEEPER_PRIVATE_KEY ?? "",

  prices: {
    dataServiceId: process.env.REDSTONE_DATA_SERVICE_ID ?? "redstone-primary-prod",
    // RedStone feed symbols; each one backs the collateral asset of the same id.
    feeds: readList("PRICE_FEEDS", ["ETH", "BTC"]),
    // Engine staleness window is PRICE_HEARTBEAT_SECONDS (3 h default);
    // push every minute so liquidation checks see current prices.
    intervalMs: readNumber("PRICE_INTERVAL_MS", 60_000),
    heartbeatSeconds: readBigInt("PRICE_HEARTBEAT_SECONDS", 3n * 60n * 60n),
  },

  liquidation: {
    // Upper bound on debt covered per liquidation call (18 decimals). 0 = no cap.
    maxDebtToCover: readBigInt("MAX_DEBT_TO_COVER", 0n),
  },
} as const;
