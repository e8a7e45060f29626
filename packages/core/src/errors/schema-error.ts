/**
 * Errors of the schema resolve/emit pass
 *
 * Always fatal: they point at an upstream schema change that needs human review.
 */

import { BaseError, type ErrorDetails } from './base-error.js';

export type SchemaErrorCode =
  | 'CYCLIC_INHERITANCE'
  | 'UNSUPPORTED_COMBINATOR'
  | 'UNSUPPORTED_TYPE'
  | 'UNRESOLVED_REFERENCE'
  | 'COLUMN_TYPE_CONFLICT'
  | 'INVALID_SCHEMA';

export type SchemaErrorDetails = ErrorDetails<SchemaErrorCode>;

export class SchemaError extends BaseError<SchemaErrorCode> {
  constructor(details: SchemaErrorDetails) {
    super('SchemaError', details);
  }

  static cyclicInheritance(path: readonly string[]): SchemaError {
    return new SchemaError({
      code: 'CYCLIC_INHERITANCE',
      message: `Cyclic inheritance: ${path.join(' -> ')}`,
      suggestion: 'A definition must not inherit (allOf/$ref) from itself, directly or transitively.',
      context: { path: [...path] },
    });
  }

  static columnTypeConflict(
    table: string,
    field: string,
    typeA: string,
    typeB: string
  ): SchemaError {
    return new SchemaError({
      code: 'COLUMN_TYPE_CONFLICT',
      message: `Column "${field}" of table "${table}" is declared as both ${typeA} and ${typeB}`,
      suggestion: `Declare "${field}" as a polymorphic field, or align its types upstream.`,
      context: { table, field, typeA, typeB },
    });
  }
}
