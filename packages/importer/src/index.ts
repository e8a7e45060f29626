/**
 * @sysml-sql/importer
 *
 * Populates the elements and relations tables from an element collection
 */

export {
  Importer,
  type ImporterOptions,
  type ImportResult,
  type CoercionFailure,
} from './importer.js';
export { coerceValue, type Coercion } from './coerce.js';
export { lowerReferences, relationId } from './relations.js';
