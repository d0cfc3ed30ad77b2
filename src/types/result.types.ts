/**
 * Operation result types
 */
import { AppError } from './error.types';

// Success wrapper
export interface OperationSuccess<T> {
  ok: true;
  data: T;
  message: string;
}

// Failure wrapper; state is left untouched
export interface OperationFailure {
  ok: false;
  error: AppError;
}

export type OperationResult<T> = OperationSuccess<T> | OperationFailure;
