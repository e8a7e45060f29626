/**
 * Schema types for describing resolved JSON schema definitions
 */

export type FieldKind =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'array'
  | 'object'
  /** A `$ref` to another definition, recorded by name only */
  | 'reference'
  /** A configured polymorphic field holding values of several kinds */
  | 'any';

export interface ItemDescriptor {
  kind: FieldKind;
  /** Declared type name, for references */
  ref?: string;
  /** For references to one of several definitions (`oneOf` of `$ref`s) */
  variants?: readonly string[];
}

export interface FieldDescriptor {
  name: string;
  kind: FieldKind;
  nullable: boolean;
  required: boolean;
  /** Declared type name of a reference field; never an expanded copy */
  ref?: string;
  /** For references to one of several definitions (`oneOf` of `$ref`s) */
  variants?: readonly string[];
  /** For array fields: the type of the array items */
  items?: ItemDescriptor;
  /** Name of the definition that declared the field */
  declaredIn: string;
}

export type DefinitionKind = 'object' | 'union' | 'scalar';

export interface SchemaDefinition {
  /** Key of the definition in `$defs` */
  readonly name: string;
  /** `$id` of the definition, if any */
  readonly id?: string;
  readonly title?: string;
  readonly kind: DefinitionKind;
  /** Own and inherited fields, first definition wins */
  readonly fields: readonly FieldDescriptor[];
  /** Direct supertypes (`allOf` references and `$ref` aliases) */
  readonly supertypes: readonly string[];
  /** Transitive supertypes, in resolution order */
  readonly ancestors: readonly string[];
  /** Value of the type-tag property (`const` of `@type`) */
  readonly discriminator?: string;
  /** For unions: the referenced member definitions */
  readonly variants?: readonly string[];
  /** For scalar definitions (e.g. string enumerations) */
  readonly scalarKind?: FieldKind;
}

export interface ResolvedSchema {
  /** Definitions sorted by name */
  readonly definitions: ReadonlyMap<string, SchemaDefinition>;
}
