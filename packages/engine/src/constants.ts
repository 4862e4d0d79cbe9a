// Protocol parameters and fixed-point scales.
//
// Amounts and USD values are 18-decimal fixed point unless noted.
// Percentages are integer percent over LIQUIDATION_PRECISION.

export const PRECISION_DECIMALS = 18;
export const PRECISION = 10n ** 18n;

/** Oracle prices are canonically quoted with 8 fractional digits. */
export const DEFAULT_ORACLE_DECIMALS = 8;

export const LIQUIDATION_PRECISION = 100n;

/** 50% — collateral must be worth at least 200% of the debt. */
export const LIQUIDATION_THRESHOLD = 50n;

/** 10% of the seized base amount, paid to the liquidator. */
export const LIQUIDATION_BONUS = 10n;

/** 1.0 — break-even solvency. */
export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor of an account without debt. */
export const MAX_HEALTH_FACTOR = 2n ** 256n - 1n;

/** Price data older than this (seconds) is stale. */
export const DEFAULT_PRICE_HEARTBEAT = 3n * 60n * 60n;
