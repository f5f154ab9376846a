export type ErrorDetails = Record<string, unknown>;

/**
 * Base class of every failure the engine reports to its callers.
 *
 * `isClientError` marks failures the caller can correct (bad input, an empty wallet,
 * a wallet that needs re-provisioning); everything else is an upstream fault.
 */
export class CustodyError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly isClientError: boolean,
    public readonly details?: ErrorDetails,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidAmountError extends CustodyError {
  constructor(message = 'Invalid amount', details?: ErrorDetails) {
    super(message, 'INVALID_AMOUNT', true, details);
  }
}

export class InvalidRequestError extends CustodyError {
  constructor(message = 'Invalid request', details?: ErrorDetails) {
    super(message, 'INVALID_REQUEST', true, details);
  }
}

export class InsufficientBalanceError extends CustodyError {
  constructor(message = 'Insufficient balance', details?: ErrorDetails) {
    super(message, 'INSUFFICIENT_BALANCE', true, details);
  }
}

export class KeyNotFoundError extends CustodyError {
  constructor(keyId: string) {
    super(
      `Private key not found for ${keyId}; the wallet may need to be re-provisioned`,
      'KEY_NOT_FOUND',
      true,
      { keyId },
    );
  }
}

export class KeyCustodyUnavailableError extends CustodyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'KEY_CUSTODY_UNAVAILABLE', false, details);
  }
}

export class LedgerUnavailableError extends CustodyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'LEDGER_UNAVAILABLE', false, details);
  }
}

export class NotFoundError extends CustodyError {
  constructor(message = 'Not found', details?: ErrorDetails) {
    super(message, 'NOT_FOUND', true, details);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
