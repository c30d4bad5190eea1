export type LedgerErrorCode =
  | 'NOT_FOUND'
  | 'INSUFFICIENT_STOCK'
  | 'DOCUMENT_ALREADY_PROCESSED'
  | 'VALIDATION_ERROR'
  | 'CONCURRENCY_CONFLICT';

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  NOT_FOUND: 404,
  INSUFFICIENT_STOCK: 409,
  DOCUMENT_ALREADY_PROCESSED: 409,
  VALIDATION_ERROR: 400,
  CONCURRENCY_CONFLICT: 409
};

export type LedgerErrorDetails = {
  message: string;
  [key: string]: unknown;
};

export class LedgerError extends Error {
  code: LedgerErrorCode;
  status: number;
  details: LedgerErrorDetails;

  constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>) {
    super(code);
    this.name = 'LedgerError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    this.details = { message, ...details };
  }
}

export type InsufficientStockDetails = {
  itemId: string;
  locationId: string;
  available: number;
  requested: number;
};

export class InsufficientStockError extends LedgerError {
  itemId: string;
  locationId: string;
  available: number;
  requested: number;

  constructor(details: InsufficientStockDetails) {
    super(
      'INSUFFICIENT_STOCK',
      `Insufficient stock: available ${details.available}, requested ${details.requested}.`,
      details
    );
    this.name = 'InsufficientStockError';
    this.itemId = details.itemId;
    this.locationId = details.locationId;
    this.available = details.available;
    this.requested = details.requested;
  }
}

export function notFound(entityType: string, id: string) {
  return new LedgerError('NOT_FOUND', `${entityType} ${id} not found.`, { entityType, id });
}

export function validationError(reason: string, message: string, details?: Record<string, unknown>) {
  return new LedgerError('VALIDATION_ERROR', message, { reason, ...details });
}

export function documentAlreadyProcessed(documentId: string, status: string, attempted: string) {
  return new LedgerError(
    'DOCUMENT_ALREADY_PROCESSED',
    `Document ${documentId} is ${status}; ${attempted} is only allowed from draft.`,
    { documentId, status, attempted }
  );
}

export function concurrencyConflict(reason: string, cause?: unknown) {
  const error = new LedgerError('CONCURRENCY_CONFLICT', 'Balance is locked by a concurrent operation.', {
    reason
  });
  if (cause !== undefined) {
    error.cause = cause;
  }
  return error;
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}
