import { AppError } from '../types/error.types';
import { OperationFailure, OperationSuccess } from '../types/result.types';

/**
 * Create a standardized success result
 */
export function createSuccessResult<T>(data: T, message: string): OperationSuccess<T> {
  return { ok: true, data, message };
}

/**
 * Create a standardized failure result
 */
export function createErrorResult(error: AppError): OperationFailure {
  return { ok: false, error };
}
