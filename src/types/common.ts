/**
 * Shared utility types.
 */

/** 'json' accepts any JSON value. */
export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object' | 'json';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  enum?: readonly string[];
  min?: number;
  max?: number;
  /** Reject non-integer numbers. */
  integer?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;
