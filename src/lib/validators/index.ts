/**
 * Validation Functions
 *
 * Pure functions for validating request bodies against field rules.
 * Each validator returns an array of violations (empty if valid).
 */

export { validateRequired } from './required.js';
export { validateTypes, validateScalarType } from './types.js';
export { validateConstraints } from './constraints.js';
export { validateEnums } from './enums.js';

export type { FieldViolation, RequestRecord } from './required.js';
export type { FieldType } from './types.js';
export type { ConstraintInfo } from './constraints.js';
