export type { AccountInformation, Position } from "./position";
export type { LiquidationResult, LiquidationPlan } from "./liquidation";
