// Runtime error types

import type { Address, PageId, RequestId } from '@quire/protocol';

export type ValidationErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_VARIANT'
  | 'INSUFFICIENT_FEE'
  | 'INVALID_FEE'
  | 'EMPTY_UPDATE'
  | 'EMPTY_FIELD'
  | 'INVALID_CONTENT_FORMAT'
  | 'INVALID_REQUEST'
  | 'PAGE_NOT_FOUND';

export type AuthorizationErrorCode = 'UNAUTHORIZED';

export type StateConflictErrorCode =
  | 'PAGE_FROZEN'
  | 'ALREADY_EXECUTED'
  | 'DUPLICATE_VOTE'
  | 'APPROVAL_NOT_APPLICABLE'
  | 'TRANSITION_NOT_ALLOWED'
  | 'NOTHING_TO_WITHDRAW'
  | 'NOT_WITHDRAWABLE'
  | 'NOT_PERMISSIONLESS'
  | 'NOTHING_TO_DISTRIBUTE'
  | 'NO_PARTICIPANTS';

export type TransferErrorCode = 'TRANSFER_FAILED';

export type RuntimeErrorCode =
  | ValidationErrorCode
  | AuthorizationErrorCode
  | StateConflictErrorCode
  | TransferErrorCode;

/**
 * Base class for all runtime errors.
 * Every failed operation throws one of these and leaves no partial effect.
 */
export class RuntimeError extends Error {
  readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Malformed input: bad id, empty required field, bad content format,
 * invalid ownership configuration.
 */
export class ValidationError extends RuntimeError {
  declare readonly code: ValidationErrorCode;
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ValidationErrorCode,
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super(code, message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a referenced page does not exist.
 */
export class PageNotFoundError extends ValidationError {
  readonly pageId: PageId;

  constructor(pageId: PageId) {
    super('PAGE_NOT_FOUND', `Page not found: ${pageId}`, { field: 'pageId' });
    this.name = 'PageNotFoundError';
    this.pageId = pageId;
  }
}

/**
 * Error when a request id does not exist on a page.
 */
export class RequestNotFoundError extends ValidationError {
  readonly pageId: PageId;
  readonly requestId: RequestId;

  constructor(pageId: PageId, requestId: RequestId) {
    super('INVALID_REQUEST', `Update request ${requestId} not found on page ${pageId}`, {
      field: 'requestId',
    });
    this.name = 'RequestNotFoundError';
    this.pageId = pageId;
    this.requestId = requestId;
  }
}

/**
 * The caller is not permitted to perform the operation.
 */
export class AuthorizationError extends RuntimeError {
  declare readonly code: AuthorizationErrorCode;
  readonly caller: Address;
  readonly pageId: PageId;

  constructor(caller: Address, pageId: PageId, reason: string) {
    super('UNAUTHORIZED', `${caller} is not authorized on page ${pageId}: ${reason}`);
    this.name = 'AuthorizationError';
    this.caller = caller;
    this.pageId = pageId;
  }
}

/**
 * The operation is well-formed but the current state forbids it.
 */
export class StateConflictError extends RuntimeError {
  declare readonly code: StateConflictErrorCode;
  readonly pageId: PageId;

  constructor(code: StateConflictErrorCode, pageId: PageId, message: string) {
    super(code, message);
    this.name = 'StateConflictError';
    this.pageId = pageId;
  }
}

/**
 * A payout was rejected. The enclosing operation is rolled back.
 */
export class TransferError extends RuntimeError {
  declare readonly code: TransferErrorCode;
  declare readonly cause?: Error;
  readonly pageId: PageId;

  constructor(pageId: PageId, message: string, cause?: Error) {
    super('TRANSFER_FAILED', `Payout from page ${pageId} failed: ${message}`, { cause });
    this.name = 'TransferError';
    this.pageId = pageId;
  }
}

export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}
