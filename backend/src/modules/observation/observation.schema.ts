/**
 * Observation input validation
 *
 * Coerces the loosely typed JSON body of POST /api/add_observation into an
 * ObservationInput. Checks run in a fixed order so the client always gets
 * the first problem: no data, missing fields, types, gender, quantity,
 * species.
 */

import { z } from 'zod';
import { ValidationError } from '../../common/errors.js';
import {
  GENDERS,
  REQUIRED_FIELDS,
  type Gender,
  type ObservationInput,
  type RequiredField,
} from './observation.types.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ═══════════════════════════════════════════════════════════════
// FIELD COERCIONS
// ═══════════════════════════════════════════════════════════════

// Booleans are rejected here as in the numeric fields
const TextField = z
  .union([z.string(), z.number().finite()])
  .transform((value) => String(value).trim());

// Numbers truncate toward zero, strings must be whole
const IntegerField = z
  .union([
    z.number().finite(),
    z.string().trim().regex(INTEGER_PATTERN).transform((value) => Number.parseInt(value, 10)),
  ])
  .transform((value) => Math.trunc(value))
  .refine((value) => Number.isSafeInteger(value));

const FloatField = z.union([
  z.number().finite(),
  z.string().trim().regex(DECIMAL_PATTERN).transform(Number).pipe(z.number().finite()),
]);

export const ObservationFieldsSchema = z.object({
  species: TextField,
  gender: TextField,
  quantity: IntegerField,
  latitude: FloatField,
  longitude: FloatField,
  userId: TextField,
});

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isGender(value: string): value is Gender {
  return GENDERS.some((gender) => gender === value);
}

export function findMissingFields(body: Record<string, unknown>): RequiredField[] {
  return REQUIRED_FIELDS.filter((field) => !Object.hasOwn(body, field));
}

// ═══════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════

/**
 * @throws ValidationError with the client-facing message
 */
export function parseObservationInput(body: unknown): ObservationInput {
  if (!isJsonObject(body) || Object.keys(body).length === 0) {
    throw new ValidationError('No data provided');
  }

  const missing = findMissingFields(body);
  if (missing.length > 0) {
    throw new ValidationError(`Missing fields: ${missing.join(', ')}`);
  }

  const parsed = ObservationFieldsSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Invalid data types provided');
  }

  const { species, gender, quantity, latitude, longitude, userId } = parsed.data;

  if (!isGender(gender)) {
    throw new ValidationError('Invalid gender value');
  }
  if (quantity < 1) {
    throw new ValidationError('Quantity must be at least 1');
  }
  if (species.length === 0) {
    throw new ValidationError('Species must not be empty');
  }

  return { species, gender, quantity, latitude, longitude, userId };
}
