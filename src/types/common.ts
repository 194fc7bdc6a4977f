/**
 * Shared utility types.
 */

export type FieldType = 'string' | 'number' | 'boolean';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings only. */
  maxLength?: number;
  /** Strings only. */
  enum?: readonly string[];
  /** Numbers only. */
  min?: number;
  /** Numbers only. */
  max?: number;
  /** Numbers only: reject fractional values. */
  integer?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;
