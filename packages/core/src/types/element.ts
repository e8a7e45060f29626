/**
 * Element types: the in-memory side of the model graph
 *
 * Many concrete SysML types share two physical tables. In memory every property
 * value is classified into a closed set of shapes; the importer projects those
 * shapes onto the wide, nullable columns of the `elements` table and onto rows
 * of the `relations` table.
 */

import type { JsonObject, JsonValue } from './json.js';

/** A raw element record as found in a dump or an API page */
export type ElementRecord = JsonObject & {
  '@id': string;
  '@type': string;
};

/** Property value shapes, keyed by `kind` */
export type PropertyValue =
  | { kind: 'null' }
  | { kind: 'scalar'; value: string | number | boolean }
  /** One (`many: false`) or several `{"@id": ...}` targets */
  | { kind: 'reference'; targets: string[]; many: boolean }
  /** Any other array or object */
  | { kind: 'structured'; value: JsonValue };

export interface Element {
  /** Opaque identifier, unique within a model (`@id`) */
  readonly id: string;
  /** Type-tag naming one schema definition (`@type`) */
  readonly type: string;
  /** Every property other than `@id` and `@type` */
  readonly properties: ReadonlyMap<string, PropertyValue>;
  /** The record the element was parsed from */
  readonly record: ElementRecord;
}

/** A directed, named edge between two elements */
export interface Relation {
  readonly id: string;
  readonly type: string;
  /** Role of the edge, the name of the property it was lowered from */
  readonly name: string;
  readonly originId: string;
  readonly targetId: string;
}
