/**
 * Value coercion
 *
 * Projects a classified property value onto the declared type of an `elements`
 * column. SQLite has no booleans; they are stored as 0/1.
 */

import { canonicalJson, type PropertyValue, type SqlValue } from '@sysml-sql/core';

export type Coercion = { ok: true; value: SqlValue } | { ok: false };

const INTEGRAL = /^-?\d+$/;

type Scalar = string | number | boolean;

function booleanFromString(value: string): number | undefined {
  if (value === 'true') return 1;
  if (value === 'false') return 0;
  return undefined;
}

function toInteger(value: Scalar): SqlValue | undefined {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return Number.isInteger(value) ? value : undefined;
  const flag = booleanFromString(value);
  if (flag !== undefined) return flag;
  if (!INTEGRAL.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : BigInt(value);
}

function toReal(value: Scalar): SqlValue | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return undefined;
  if (value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toText(value: Scalar): SqlValue {
  return typeof value === 'string' ? value : String(value);
}

function ok(value: SqlValue | undefined): Coercion {
  return value === undefined ? { ok: false } : { ok: true, value };
}

/**
 * @param columnType declared column type as reported by the database
 */
export function coerceValue(value: PropertyValue, columnType: string): Coercion {
  switch (value.kind) {
    case 'null':
      return { ok: true, value: null };
    // The edge is written to `relations`; the column holds no copy
    case 'reference':
      return { ok: true, value: null };
    case 'structured':
      if (columnType === 'INTEGER' || columnType === 'REAL') return { ok: false };
      return { ok: true, value: canonicalJson(value.value) };
    case 'scalar':
      switch (columnType) {
        case 'INTEGER':
          return ok(toInteger(value.value));
        case 'REAL':
          return ok(toReal(value.value));
        case 'TEXT':
          return ok(toText(value.value));
        default:
          return ok(typeof value.value === 'boolean' ? (value.value ? 1 : 0) : value.value);
      }
  }
}
