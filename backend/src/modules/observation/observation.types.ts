/**
 * Observation Types
 */

import type { ObjectId } from 'mongodb';

export const GENDERS = ['Male', 'Female', 'Unknown'] as const;

export type Gender = (typeof GENDERS)[number];

export const REQUIRED_FIELDS = [
  'species',
  'gender',
  'quantity',
  'latitude',
  'longitude',
  'userId',
] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/**
 * Validated, coerced client input. Never carries id or timestamp.
 */
export interface ObservationInput {
  species: string;
  gender: Gender;
  quantity: number;
  latitude: number;
  longitude: number;
  userId: string;
}

/** Document as written to the collection (before the driver assigns _id). */
export interface NewObservation extends ObservationInput {
  timestamp: Date;
}

/** Document as read back from the collection. */
export interface ObservationDoc extends NewObservation {
  _id: ObjectId;
}

/** JSON rendering returned by the read endpoints. */
export interface ObservationView extends ObservationInput {
  _id: string;
  timestamp: string;
}
