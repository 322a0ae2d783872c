// core/errors.ts: Error taxonomy for every rejected engine operation

export type ErrorKind = 'configuration' | 'policy' | 'collaborator' | 'invariant';

export type ConfigurationErrorCode =
  | 'MarketNotListed'
  | 'MarketAlreadyListed'
  | 'InvalidMarket'
  | 'InvalidCollateralFactor'
  | 'InvalidLiquidationThreshold'
  | 'InvalidCloseFactor'
  | 'InvalidLiquidationIncentive'
  | 'InvalidMaxLoopsLimit'
  | 'InvalidInput'
  | 'RewardsDistributorAlreadyAdded'
  | 'LastRewardingSlotInPast'
  | 'Unauthorized';

export type PolicyErrorCode =
  | 'ActionPaused'
  | 'SupplyCapExceeded'
  | 'BorrowCapExceeded'
  | 'InsufficientLiquidity'
  | 'InsufficientShortfall'
  | 'TooMuchRepay'
  | 'MinimalCollateralViolated'
  | 'CollateralExceedsThreshold'
  | 'InsufficientCollateral'
  | 'NonzeroBorrowBalance'
  | 'MarketNotCollateral'
  | 'ComptrollerMismatch'
  | 'MaxLoopsLimitExceeded'
  | 'DelegationStatusUnchanged'
  | 'DelegateNotApproved'
  | 'InsufficientRewardBalance';

export type CollaboratorErrorCode = 'SnapshotError' | 'PriceError' | 'ExchangeRateError';

export type InvariantErrorCode = 'NonzeroBorrowBalance' | 'RewardIndexOverflow';

export type ErrorCode =
  | ConfigurationErrorCode
  | PolicyErrorCode
  | CollaboratorErrorCode
  | InvariantErrorCode;

/**
 * Base class of every error the engine raises on purpose.
 * `code` is stable and safe to branch on; `detail` carries the offending values.
 */
export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly detail: Record<string, string> = {}
  ) {
    super(message);
  }

  toJSON(): { kind: ErrorKind; code: ErrorCode; message: string; detail: Record<string, string> } {
    return { kind: this.kind, code: this.code, message: this.message, detail: this.detail };
  }
}

export class ConfigurationError extends EngineError {
  readonly kind = 'configuration';

  constructor(code: ConfigurationErrorCode, message: string, detail?: Record<string, string>) {
    super(code, message, detail);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class PolicyError extends EngineError {
  readonly kind = 'policy';

  constructor(code: PolicyErrorCode, message: string, detail?: Record<string, string>) {
    super(code, message, detail);
    this.name = 'PolicyError';
    Object.setPrototypeOf(this, PolicyError.prototype);
  }
}

export class CollaboratorError extends EngineError {
  readonly kind = 'collaborator';

  constructor(code: CollaboratorErrorCode, message: string, detail?: Record<string, string>) {
    super(code, message, detail);
    this.name = 'CollaboratorError';
    Object.setPrototypeOf(this, CollaboratorError.prototype);
  }
}

/**
 * An unrecoverable defect: the current operation is aborted and never repaired
 */
export class InvariantViolation extends EngineError {
  readonly kind = 'invariant';

  constructor(code: InvariantErrorCode, message: string, detail?: Record<string, string>) {
    super(code, message, detail);
    this.name = 'InvariantViolation';
    Object.setPrototypeOf(this, InvariantViolation.prototype);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function marketNotListed(market: string): ConfigurationError {
  return new ConfigurationError('MarketNotListed', `Market ${market} is not listed`, { market });
}
