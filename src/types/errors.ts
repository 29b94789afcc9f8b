/**
 * Error Codes for the ATM ledger
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Account and balance errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_INPUT = 2003,

  // Account errors (3xxx)
  INSUFFICIENT_FUNDS = 3001,
  ACCOUNT_NOT_FOUND = 3002,
  ACCOUNT_ALREADY_EXISTS = 3003,
  RESOURCE_NOT_FOUND = 3010,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  LEDGER_WRITE_ERROR = 5002,
}

/**
 * Broad failure classes a caller reacts to.
 * INVALID_ARGUMENT: the request itself is wrong (bad amount, unknown or duplicate key).
 * RUNTIME: the request is well formed but the account state rejects it.
 * SYSTEM: the environment failed (filesystem, unexpected exception).
 */
export enum ErrorKind {
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  RUNTIME = 'RUNTIME',
  SYSTEM = 'SYSTEM',
}

export const errorCodeToKind: Record<ErrorCode, ErrorKind> = {
  [ErrorCode.VALIDATION_ERROR]: ErrorKind.INVALID_ARGUMENT,
  [ErrorCode.INVALID_AMOUNT]: ErrorKind.INVALID_ARGUMENT,
  [ErrorCode.INVALID_INPUT]: ErrorKind.INVALID_ARGUMENT,
  [ErrorCode.ACCOUNT_NOT_FOUND]: ErrorKind.INVALID_ARGUMENT,
  [ErrorCode.ACCOUNT_ALREADY_EXISTS]: ErrorKind.INVALID_ARGUMENT,
  [ErrorCode.RESOURCE_NOT_FOUND]: ErrorKind.INVALID_ARGUMENT,
  [ErrorCode.INSUFFICIENT_FUNDS]: ErrorKind.RUNTIME,
  [ErrorCode.INTERNAL_ERROR]: ErrorKind.SYSTEM,
  [ErrorCode.LEDGER_WRITE_ERROR]: ErrorKind.SYSTEM,
};

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Validation errors -> 400
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_INPUT]: 400,

  // Account errors -> 404/409/422
  [ErrorCode.INSUFFICIENT_FUNDS]: 422,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.ACCOUNT_ALREADY_EXISTS]: 409,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  // System errors -> 500
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.LEDGER_WRITE_ERROR]: 500,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    kind: ErrorKind;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}
