// src/types/errors.ts

export type ErrorClass =
  | 'VALIDATION'
  | 'STATE'
  | 'ARITHMETIC'
  | 'SLIPPAGE'
  | 'AUTHORIZATION'
  | 'NETWORK'
  | 'CONSISTENCY';

export abstract class LaunchpadError extends Error {
  abstract readonly errorClass: ErrorClass;
  abstract readonly code: string;
  readonly retryable: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Bad input; rejected before any state read
export class ValidationError extends LaunchpadError {
  readonly errorClass = 'VALIDATION';
  readonly code: string = 'VALIDATION_FAILED';
}

// Idempotent collisions; callers treat these as successful no-ops
export abstract class StateError extends LaunchpadError {
  readonly errorClass = 'STATE';
}

export class AlreadyDeployedError extends StateError {
  readonly code = 'ALREADY_DEPLOYED';
}

export class AlreadyMigratedError extends StateError {
  readonly code = 'ALREADY_MIGRATED';
}

export class CurveMigratedError extends StateError {
  readonly code = 'CURVE_MIGRATED';
}

export class CurvePausedError extends StateError {
  readonly code = 'CURVE_PAUSED';
}

export class MigrationNotTriggeredError extends StateError {
  readonly code = 'MIGRATION_NOT_TRIGGERED';
}

export class UnknownLaunchError extends StateError {
  readonly code = 'UNKNOWN_LAUNCH';
}

export class CurveArithmeticError extends LaunchpadError {
  readonly errorClass = 'ARITHMETIC';
  readonly code = 'ARITHMETIC';
}

export class SlippageExceededError extends LaunchpadError {
  readonly errorClass = 'SLIPPAGE';
  readonly code = 'SLIPPAGE_EXCEEDED';

  constructor(
    message: string,
    readonly expected: bigint,
    readonly actual: bigint
  ) {
    super(message);
  }
}

export class UnauthorizedCallerError extends LaunchpadError {
  readonly errorClass = 'AUTHORIZATION';
  readonly code = 'UNAUTHORIZED_CALLER';

  constructor(readonly callerIdentity: string, action?: string) {
    super(`Caller ${callerIdentity} is not authorized${action ? ` to ${action}` : ''}`);
  }
}

export class NetworkError extends LaunchpadError {
  readonly errorClass = 'NETWORK';
  readonly code: string = 'NETWORK_ERROR';
  readonly retryable = true;
}

export class ChainTimeoutError extends NetworkError {
  readonly code = 'CHAIN_TIMEOUT';
}

export class StaleSequenceError extends LaunchpadError {
  readonly errorClass = 'CONSISTENCY';
  readonly code = 'STALE_SEQUENCE';

  constructor(readonly seq: number, readonly lastAppliedSeq: number) {
    super(`Sequence ${seq} is not newer than ${lastAppliedSeq}`);
  }
}

export function isLaunchpadError(error: unknown): error is LaunchpadError {
  return error instanceof LaunchpadError;
}

export function isRetryable(error: unknown): boolean {
  return isLaunchpadError(error) ? error.retryable : false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
