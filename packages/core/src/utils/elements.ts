/**
 * Element record helpers shared by the dump files and the importer
 */

import { ImportError } from '../errors/index.js';
import { elementRecordSchema } from '../validation/index.js';
import type { Element, ElementRecord, JsonValue, PropertyValue } from '../types/index.js';
import { ID_COLUMN, TYPE_COLUMN } from '../constants.js';
import { canonicalJson, isPlainObject } from './json.js';

/**
 * The target of a `{"@id": "..."}` reference object, the only key allowed
 */
export function referenceTarget(value: JsonValue): string | undefined {
  if (!isPlainObject(value)) return undefined;
  const keys = Object.keys(value);
  if (keys.length !== 1 || keys[0] !== ID_COLUMN) return undefined;
  const id = value[ID_COLUMN];
  return typeof id === 'string' ? id : undefined;
}

export function classifyProperty(value: JsonValue): PropertyValue {
  if (value === null) return { kind: 'null' };
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return { kind: 'scalar', value };
  }
  if (Array.isArray(value)) {
    const targets: string[] = [];
    for (const item of value) {
      const target = referenceTarget(item);
      if (target === undefined) return { kind: 'structured', value };
      targets.push(target);
    }
    // An empty array is an empty to-many reference
    return { kind: 'reference', targets, many: true };
  }
  const target = referenceTarget(value);
  if (target !== undefined) return { kind: 'reference', targets: [target], many: false };
  return { kind: 'structured', value };
}

/**
 * Validate raw records as element records
 *
 * @throws ImportError(MALFORMED_ELEMENT) naming the index of the first bad record
 */
export function parseElementRecords(records: readonly unknown[]): ElementRecord[] {
  return records.map((record, index) => {
    const parsed = elementRecordSchema.safeParse(record);
    if (parsed.success) return parsed.data;
    const rawId = isPlainObject(record) ? record[ID_COLUMN] : undefined;
    const id = typeof rawId === 'string' && rawId.length > 0 ? rawId : undefined;
    const reason = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw ImportError.malformedElement(index, reason, id);
  });
}

export function parseElement(record: ElementRecord): Element {
  const properties = new Map<string, PropertyValue>();
  for (const [name, value] of Object.entries(record)) {
    if (name === ID_COLUMN || name === TYPE_COLUMN) continue;
    properties.set(name, classifyProperty(value));
  }
  return { id: record[ID_COLUMN], type: record[TYPE_COLUMN], properties, record };
}

export interface DedupeResult {
  /** First occurrence of every id, in source order */
  elements: ElementRecord[];
  /** Number of identical repeats that were dropped */
  duplicates: number;
}

/**
 * Drop repeated records with identical content
 *
 * A faulty server may deliver the same element twice across pages. Two records
 * with one id and different content are a conflict.
 */
export function dedupeElements(records: readonly ElementRecord[]): DedupeResult {
  const seen = new Map<string, string>();
  const elements: ElementRecord[] = [];
  let duplicates = 0;

  for (const record of records) {
    const id = record[ID_COLUMN];
    const content = canonicalJson(record);
    const previous = seen.get(id);
    if (previous === undefined) {
      seen.set(id, content);
      elements.push(record);
      continue;
    }
    if (previous !== content) {
      throw new ImportError({
        code: 'CONFLICTING_ELEMENTS',
        message: `Element ${id} occurs more than once with different content`,
        suggestion: 'Re-fetch the model; the source delivered inconsistent pages.',
        context: { id },
      });
    }
    duplicates++;
  }

  return { elements, duplicates };
}
