import { errorHandler } from './error-handler';

export type Handler<A extends unknown[]> = (...args: A) => string[];

/**
 * Safe handler wrapper
 *
 * Wraps a controller handler so a thrown error becomes display lines instead of
 * escaping into the caller's loop.
 *
 * Usage:
 * ```typescript
 * addBeer = safeHandler((input: unknown) => {
 *   const result = this.inventoryService.addItem(validate(beerCandidateSchema, input));
 *   return [result.ok ? result.message : result.error.message];
 * });
 * ```
 */
export const safeHandler = <A extends unknown[]>(fn: Handler<A>): Handler<A> => {
  return (...args: A) => {
    try {
      return fn(...args);
    } catch (error) {
      return errorHandler(error);
    }
  };
};
