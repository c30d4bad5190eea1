import { validationError } from '../../lib/errors';
import { isWithinQuantityRange, QUANTITY_MAX, roundQuantity } from '../../lib/numbers';

export function assertDocumentNumber(number: string) {
  if (!number.trim()) {
    throw validationError('DOCUMENT_NUMBER_REQUIRED', 'Document number is required.');
  }
}

export function assertLinesPresent(lines: unknown[]) {
  if (lines.length === 0) {
    throw validationError('DOCUMENT_HAS_NO_LINES', 'Document must have at least one line.');
  }
}

function assertQuantityInRange(quantity: number, lineNumber: number) {
  if (!isWithinQuantityRange(quantity)) {
    throw validationError('QUANTITY_OUT_OF_RANGE', `Line ${lineNumber} quantity must not exceed ${QUANTITY_MAX}.`, {
      lineNumber,
      quantity
    });
  }
}

/**
 * Returns the quantity at ledger precision. The check runs on the rounded value, so a
 * quantity that rounds to zero is rejected.
 */
export function assertPositiveQuantity(quantity: number, lineNumber: number): number {
  assertQuantityInRange(quantity, lineNumber);
  const rounded = roundQuantity(quantity);
  if (rounded <= 0) {
    throw validationError('QUANTITY_NOT_POSITIVE', `Line ${lineNumber} quantity must be a positive number.`, {
      lineNumber,
      quantity
    });
  }
  return rounded;
}

export function assertNonNegativeQuantity(quantity: number, lineNumber: number): number {
  assertQuantityInRange(quantity, lineNumber);
  const rounded = roundQuantity(quantity);
  if (rounded < 0) {
    throw validationError('QUANTITY_NEGATIVE', `Line ${lineNumber} counted quantity must be zero or more.`, {
      lineNumber,
      quantity
    });
  }
  return rounded;
}

export function assertUnitPrice(unitPrice: number | null, lineNumber: number): number | null {
  if (unitPrice === null) return null;
  if (!isWithinQuantityRange(unitPrice) || unitPrice < 0) {
    throw validationError('UNIT_PRICE_INVALID', `Line ${lineNumber} unit price must be between 0 and ${QUANTITY_MAX}.`, {
      lineNumber,
      unitPrice
    });
  }
  return unitPrice;
}
