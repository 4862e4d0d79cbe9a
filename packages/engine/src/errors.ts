// Engine error taxonomy.
//
// Every per-call error aborts the operation and leaves ledgers and
// collaborator balances as they were before the call.

export type EngineErrorCode =
  | "INVALID_CONFIGURATION"
  | "ZERO_AMOUNT"
  | "UNSUPPORTED_ASSET"
  | "INSUFFICIENT_BALANCE"
  | "TRANSFER_FAILED"
  | "MINT_FAILED"
  | "STALE_PRICE_DATA"
  | "INVALID_PRICE"
  | "HEALTH_FACTOR_BELOW_MINIMUM"
  | "HEALTH_FACTOR_OK"
  | "HEALTH_FACTOR_NOT_IMPROVED"
  | "REENTRANT_CALL"
  | "DEBT_TOO_SMALL"
  | "COMPENSATION_FAILED";

export class EngineError extends Error {
  constructor(readonly code: EngineErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Mismatched asset/oracle lists, duplicate assets. Construction aborts. */
export class InvalidConfigurationError extends EngineError {
  constructor(reason: string) {
    super("INVALID_CONFIGURATION", `Invalid engine configuration: ${reason}`);
  }
}

export class ZeroAmountError extends EngineError {
  constructor() {
    super("ZERO_AMOUNT", "Amount must be greater than zero");
  }
}

export class UnsupportedAssetError extends EngineError {
  constructor(readonly asset: string) {
    super("UNSUPPORTED_ASSET", `Asset "${asset}" is not registered as collateral`);
  }
}

export class InsufficientBalanceError extends EngineError {
  constructor(readonly requested: bigint, readonly available: bigint) {
    super(
      "INSUFFICIENT_BALANCE",
      `Requested ${requested} exceeds recorded balance ${available}`
    );
  }
}

export class TransferFailedError extends EngineError {
  constructor(asset: string, direction: "in" | "out", counterparty: string, amount: bigint) {
    super(
      "TRANSFER_FAILED",
      `Transfer ${direction} of ${amount} ${asset} ${direction === "in" ? "from" : "to"} ${counterparty} was refused`
    );
  }
}

export class MintFailedError extends EngineError {
  constructor(to: string, amount: bigint) {
    super("MINT_FAILED", `Debt token refused to mint ${amount} to ${to}`);
  }
}

export class StalePriceDataError extends EngineError {
  constructor(readonly asset: string, readonly updatedAt: bigint, readonly now: bigint) {
    super(
      "STALE_PRICE_DATA",
      `Price for "${asset}" was last updated at ${updatedAt}, ${now - updatedAt}s ago`
    );
  }
}

export class InvalidPriceError extends EngineError {
  constructor(readonly asset: string, readonly price: bigint) {
    super("INVALID_PRICE", `Oracle returned non-positive price ${price} for "${asset}"`);
  }
}

export class HealthFactorBelowMinimumError extends EngineError {
  constructor(readonly healthFactor: bigint) {
    super(
      "HEALTH_FACTOR_BELOW_MINIMUM",
      `Health factor ${healthFactor} is below the minimum`
    );
  }
}

/** Liquidation attempted against a solvent account. */
export class HealthFactorOkError extends EngineError {
  constructor(readonly healthFactor: bigint) {
    super("HEALTH_FACTOR_OK", `Account is solvent (health factor ${healthFactor})`);
  }
}

export class HealthFactorNotImprovedError extends EngineError {
  constructor(readonly startingHealthFactor: bigint, readonly endingHealthFactor: bigint) {
    super(
      "HEALTH_FACTOR_NOT_IMPROVED",
      `Liquidation did not improve health factor (${startingHealthFactor} -> ${endingHealthFactor})`
    );
  }
}

/** A collaborator called back into a guarded operation. */
export class ReentrantCallError extends EngineError {
  constructor(operation: string) {
    super("REENTRANT_CALL", `Reentrant call to ${operation} rejected`);
  }
}

/** The debt to cover is worth less than one raw unit of the seized asset. */
export class DebtTooSmallError extends EngineError {
  constructor(readonly asset: string, readonly debtToCover: bigint) {
    super("DEBT_TOO_SMALL", `Covering ${debtToCover} debt buys no ${asset}; amount is below one unit`);
  }
}

/**
 * An operation failed and at least one of its applied effects could not be
 * reversed. `cause` is the original failure; `failedSteps` are the labels of
 * the effects left in place.
 */
export class CompensationFailedError extends EngineError {
  constructor(
    readonly operation: string,
    readonly failedSteps: readonly string[],
    cause: unknown
  ) {
    super(
      "COMPENSATION_FAILED",
      `${operation} rolled back with unreversed steps: ${failedSteps.join("; ")}`,
      { cause }
    );
  }
}
