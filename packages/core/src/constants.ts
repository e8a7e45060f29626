/**
 * Names shared by the DDL emitter, the importer and the bundled queries
 */

export const ELEMENTS_TABLE = 'elements';
export const RELATIONS_TABLE = 'relations';

/** Primary key of both tables */
export const ID_COLUMN = '@id';
/** Type-tag column of both tables */
export const TYPE_COLUMN = '@type';

export const RELATION_NAME_COLUMN = 'name';
export const RELATION_ORIGIN_COLUMN = 'origin_id';
export const RELATION_TARGET_COLUMN = 'target_id';

/** `@type` of relations lowered from element properties */
export const REFERENCE_RELATION_TYPE = 'Reference';

/** Fields holding values of several kinds, stored in ANY columns */
export const DEFAULT_POLYMORPHIC_FIELDS: readonly string[] = ['value'];

export const DEFAULT_INDEXED_COLUMNS: readonly string[] = [
  'declaredName',
  'declaredShortName',
  'isLibraryElement',
  'name',
  'qualifiedName',
  'value',
];

export const STATUS_REPORT_INTERVAL_MS = 5000;
