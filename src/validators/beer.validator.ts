import { z } from 'zod';
import { ContainerSize } from '../models/container-size.model';
import { BeerCandidate, BeerPatch, TOTAL_KEY } from '../types/beer.types';

/**
 * Beer validation schemas
 *
 * Raw field values arrive as strings from a prompt or as already-typed values.
 */

const TRUE_WORDS: readonly string[] = ['1', 'true', 'yes', 'y'];

// Blank prompt answers count as "not supplied"
const blankToUndefined = (val: unknown) =>
  typeof val === 'string' && val.trim() === '' ? undefined : val;

const nameField = z
  .string({ required_error: 'Name is required' })
  .trim()
  .min(1, 'Name is required')
  .max(255, 'Name must be at most 255 characters')
  .refine((val) => val !== TOTAL_KEY, `'${TOTAL_KEY}' is reserved for the stock total`);

const styleField = z
  .string({ required_error: 'Style is required' })
  .trim()
  .min(1, 'Style is required')
  .max(255, 'Style must be at most 255 characters');

const strengthField = z.coerce
  .number({ invalid_type_error: 'Alcohol content must be a number' })
  .min(0, 'Alcohol content cannot be negative')
  .max(100, 'Alcohol content cannot exceed 100%');

const sizeField = z.coerce
  .number({ invalid_type_error: 'Container size must be a number' })
  .int('Container size must be a whole number')
  .nonnegative('Container size cannot be negative');

const quantityField = z.coerce
  .number({ invalid_type_error: 'Quantity must be a number' })
  .int('Quantity must be an integer');

const unitFlagField = z.preprocess(
  (val) => (typeof val === 'string' ? val.trim().toLowerCase() : val),
  z.union(
    [
      z.boolean(),
      z.literal(1).transform(() => true),
      z.literal(0).transform(() => false),
      z
        .enum(['1', 'true', 'yes', 'y', '0', 'false', 'no', 'n'])
        .transform((val) => TRUE_WORDS.includes(val)),
    ],
    { errorMap: () => ({ message: 'Metric flag must be 1 (yes) or 0 (no)' }) }
  )
);

const barcodeField = z
  .union([z.string(), z.number()], {
    errorMap: () => ({ message: 'Barcode is required' }),
  })
  .transform((val) => String(val).trim())
  .pipe(z.string().regex(/^\d{12}$/, 'Barcode must be exactly 12 digits'))
  .transform(Number);

// Add beer input schema
export const beerCandidateSchema = z
  .object({
    name: nameField,
    style: styleField,
    strengthPercent: z.preprocess(blankToUndefined, strengthField),
    size: z.preprocess(blankToUndefined, sizeField),
    isMetric: unitFlagField,
    quantity: z.preprocess(blankToUndefined, quantityField),
    barcode: barcodeField,
  })
  .transform(
    ({ isMetric, size, ...fields }): BeerCandidate => ({
      ...fields,
      size: new ContainerSize(isMetric, size),
    })
  );

// Edit beer input schema; blank strings keep the current value
export const beerPatchSchema = z
  .object({
    name: z
      .string()
      .trim()
      .max(255, 'Name must be at most 255 characters')
      .refine((val) => val !== TOTAL_KEY, `'${TOTAL_KEY}' is reserved for the stock total`)
      .optional(),
    style: z.string().trim().max(255, 'Style must be at most 255 characters').optional(),
    strengthPercent: z.preprocess(blankToUndefined, strengthField.optional()),
    size: z.preprocess(blankToUndefined, sizeField.optional()),
    isMetric: z.preprocess(blankToUndefined, unitFlagField.optional()),
    quantity: z.preprocess(
      blankToUndefined,
      quantityField.nonnegative('Quantity cannot be negative').optional()
    ),
    barcode: z.preprocess(blankToUndefined, barcodeField.optional()),
  })
  .transform((patch): BeerPatch => patch);

// Remove by ID schema
export const removeBeerSchema = z.object({
  id: z.coerce
    .number({ invalid_type_error: 'ID must be a number' })
    .int('ID must be an integer')
    .positive('ID must be positive'),
});

// Infer TypeScript types from schemas
export type BeerCandidateInput = z.input<typeof beerCandidateSchema>;
export type BeerPatchInput = z.input<typeof beerPatchSchema>;
export type RemoveBeerInput = z.input<typeof removeBeerSchema>;
