import { ZodError, ZodTypeAny, z } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';

export interface FieldError {
  field: string;
  message: string;
}

/**
 * Validate raw caller input against a Zod schema
 *
 * Returns the parsed value, or throws a VALIDATION_ERROR listing every failing field.
 *
 * Usage:
 * ```typescript
 * const candidate = validate(beerCandidateSchema, answers);
 * inventory.addItem(candidate);
 * ```
 */
export const validate = <S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> => {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const errors: FieldError[] = error.errors.map((err) => ({
        field: err.path.join('.'),
        message: err.message,
      }));

      throw new AppError(ErrorCode.VALIDATION_ERROR, 'Validation failed', 400, { errors });
    }
    throw error;
  }
};
