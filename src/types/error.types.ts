/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Input errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_QUANTITY = 'INVALID_QUANTITY',
  RESERVED_NAME = 'RESERVED_NAME',

  // Not found errors (404)
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',
  INVENTORY_EMPTY = 'INVENTORY_EMPTY',

  // Conflict errors (409)
  DUPLICATE_NAME = 'DUPLICATE_NAME',
  NAME_CONFLICT = 'NAME_CONFLICT',

  // Unexpected failures (500)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const invalidQuantity = (quantity: number): AppError =>
  new AppError(
    ErrorCode.INVALID_QUANTITY,
    'Invalid quantity. Please enter a positive value.',
    400,
    { quantity }
  );

export const reservedName = (name: string): AppError =>
  new AppError(ErrorCode.RESERVED_NAME, `'${name}' is reserved for the stock total.`, 400, {
    name,
  });

export const duplicateName = (name: string): AppError =>
  new AppError(ErrorCode.DUPLICATE_NAME, `Beer with name '${name}' already exists.`, 409, {
    name,
  });

export const nameConflict = (from: string, to: string): AppError =>
  new AppError(
    ErrorCode.NAME_CONFLICT,
    `Cannot rename '${from}' to '${to}': another beer already uses that name.`,
    409,
    { from, to }
  );

export const beerNameNotFound = (name: string): AppError =>
  new AppError(ErrorCode.ITEM_NOT_FOUND, `Beer with name '${name}' not found.`, 404, { name });

export const beerIdNotFound = (id: number): AppError =>
  new AppError(ErrorCode.ITEM_NOT_FOUND, `Beer with ID ${id} not found.`, 404, { id });

export const inventoryEmpty = (): AppError =>
  new AppError(ErrorCode.INVENTORY_EMPTY, 'No beer has been added to stock yet.', 404);
