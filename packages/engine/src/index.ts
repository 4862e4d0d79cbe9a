export { CollateralEngine } from "./engine";
export type { EngineOptions } from "./engine";
export { AssetRegistry } from "./asset-registry";
export type { CollateralAsset } from "./asset-registry";
export { CollateralLedger } from "./collateral-ledger";
export { DebtLedger } from "./debt-ledger";
export { Valuation } from "./valuation";
export type { ValuationOptions } from "./valuation";
export { calculateHealthFactor, isHealthy } from "./health-factor";
export { ReentrancyGuard } from "./reentrancy-guard";
export { UnitOfWork } from "./unit-of-work";
export type { Effect, EffectStage } from "./unit-of-work";
export { createEngineLogger } from "./logger";
export type { Logger } from "./logger";
export { systemClock } from "./interfaces";
export type { Clock, DebtToken, FungibleAsset, PriceData, PriceOracle } from "./interfaces";
export * from "./constants";
export * from "./errors";
export * from "./fixed-point";
export { InMemoryToken } from "./in-memory/token";
export { InMemoryDebtToken } from "./in-memory/debt-token";
export { PushPriceFeed } from "./in-memory/price-feed";
