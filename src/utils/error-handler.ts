import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Turn any thrown error into display lines
 *
 * Known application errors show their own message (plus one line per invalid field);
 * anything else is logged and reported generically.
 */
export const errorHandler = (err: unknown): string[] => {
  if (err instanceof AppError) {
    logger.warn('Operation failed', { code: err.code, message: err.message });

    const lines = [err.message];
    if (err.code === ErrorCode.VALIDATION_ERROR) {
      const fieldErrors = err.details?.['errors'];
      if (Array.isArray(fieldErrors)) {
        for (const fieldError of fieldErrors) {
          if (isFieldError(fieldError)) {
            lines.push(`  ${fieldError.field}: ${fieldError.message}`);
          }
        }
      }
    }
    return lines;
  }

  logger.error('Error occurred', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  return ['An unexpected error occurred'];
};

function isFieldError(value: unknown): value is { field: string; message: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'field' in value &&
    'message' in value &&
    typeof value.field === 'string' &&
    typeof value.message === 'string'
  );
}
