/**
 * Importer
 *
 * Writes an element collection into the `elements` and `relations` tables
 * created by the DDL emitter. Every element becomes one row keyed by its id and
 * every directed reference one relation row; the relation rows of a
 * relation-like element also carry its relation attributes. All writes of a run happen in one
 * transaction, so a failure leaves the previous snapshot intact.
 *
 * Re-importing is idempotent: rows are written with replace-on-conflict and
 * the outgoing relations of every imported element are deleted before they
 * are written again.
 */

import {
  BaseError,
  ELEMENTS_TABLE,
  ID_COLUMN,
  ImportError,
  Logger,
  ProgressReporter,
  RELATION_NAME_COLUMN,
  RELATION_ORIGIN_COLUMN,
  RELATION_TARGET_COLUMN,
  RELATIONS_TABLE,
  REFERENCE_RELATION_TYPE,
  TYPE_COLUMN,
  dedupeElements,
  errorMessage,
  parseElement,
  parseElementRecords,
  type BulkInsertTuning,
  type Element,
  type ElementSource,
  type IDatabaseGateway,
  type Relation,
  type SqlValue,
} from '@sysml-sql/core';
import { coerceValue } from './coerce.js';
import { lowerReferences } from './relations.js';

export interface ImporterOptions {
  /** Run VACUUM after a successful import (ANALYZE always runs) */
  vacuum?: boolean;
  /**
   * Write relations whose target is unknown instead of skipping them; they
   * are reported either way. The gateway must not enforce foreign keys.
   */
  disableForeignKeyChecks?: boolean;
  /**
   * `@type`s of relation-like elements, as given to the DDL emitter. Their
   * edges are typed with that `@type` and carry the element's values for the
   * attribute columns of `relations`.
   */
  relationTypes?: readonly string[];
  /** Database settings applied around the transaction */
  tuning?: BulkInsertTuning;
  logger?: Logger;
}

export interface CoercionFailure {
  table: string;
  column: string;
  columnType: string;
  /** Values stored as NULL */
  count: number;
  /** First element whose value could not be stored */
  elementId: string;
}

export interface ImportResult {
  /** Element rows written */
  elements: number;
  /** Identical repeats dropped before writing */
  duplicates: number;
  /** Relation rows written */
  relations: number;
  /** Previous outgoing relations of the imported elements that were deleted */
  replacedRelations: number;
  danglingReferences: ImportError[];
  /** Attributes that are neither a column nor a reference, sorted */
  unmappedAttributes: string[];
  coercionFailures: CoercionFailure[];
  durationMs: number;
}

interface TableRow {
  columns: string[];
  values: SqlValue[];
}

interface RelationRow extends TableRow {
  relation: Relation;
}

/** An element projected onto both tables */
interface PreparedElement {
  element: Element;
  row: TableRow;
  /** Values for the attribute columns of its relation rows */
  attributes: TableRow;
}

type ColumnTypes = Record<typeof ELEMENTS_TABLE | typeof RELATIONS_TABLE, ReadonlyMap<string, string>>;

const RELATION_FRAMEWORK_COLUMNS: readonly string[] = [
  ID_COLUMN,
  TYPE_COLUMN,
  RELATION_NAME_COLUMN,
  RELATION_ORIGIN_COLUMN,
  RELATION_TARGET_COLUMN,
];

function hasEdges(element: Element): boolean {
  for (const value of element.properties.values()) {
    if (value.kind === 'reference' && value.targets.length > 0) return true;
  }
  return false;
}

export class Importer {
  private readonly logger: Logger;
  private readonly relationTypes: ReadonlySet<string>;

  constructor(
    private readonly gateway: IDatabaseGateway,
    private readonly options: ImporterOptions = {}
  ) {
    this.logger = options.logger ?? new Logger();
    this.relationTypes = new Set(options.relationTypes ?? []);
  }

  /**
   * Read a source completely, then import it
   */
  async importSource(source: ElementSource): Promise<ImportResult> {
    this.logger.info('Reading elements', { source: source.describe() });
    const records = await source.readElements();
    return this.importElements(records);
  }

  importElements(records: readonly unknown[]): ImportResult {
    const startedAt = Date.now();
    const { elements: unique, duplicates } = dedupeElements(parseElementRecords(records));
    if (duplicates > 0) {
      this.logger.warn('Dropped repeated elements', { duplicates });
    }
    const elements = unique.map(parseElement);
    const columnTypes = this.columnTypes();

    const unmapped = new Set<string>();
    const failures = new Map<string, CoercionFailure>();
    const prepared = elements.map((element) => this.prepare(element, columnTypes, unmapped, failures));

    const knownIds = new Set(elements.map((element) => element.id));
    const { relations, dangling } = this.resolveRelations(prepared, knownIds);

    const tuning = this.options.tuning;
    tuning?.before();
    let began = false;
    let replacedRelations: number;
    try {
      this.gateway.beginTransaction();
      began = true;
      replacedRelations = this.write(
        prepared.map((item) => item.row),
        [...knownIds],
        relations
      );
      this.gateway.commit();
    } catch (err) {
      this.abort(err, began);
      throw err instanceof ImportError
        ? err
        : new ImportError({
            code: 'DATABASE_ERROR',
            message: `Import rolled back: ${errorMessage(err)}`,
            suggestion: err instanceof BaseError ? err.suggestion : undefined,
            cause: err instanceof Error ? err : undefined,
            context: err instanceof BaseError ? err.context : undefined,
          });
    }
    tuning?.after({ committed: true, vacuum: this.options.vacuum ?? false });

    for (const failure of failures.values()) {
      this.logger.warn('Values could not be stored and were replaced by NULL', { ...failure });
    }
    if (unmapped.size > 0) {
      this.logger.warn('Attributes without a column were not stored', {
        attributes: [...unmapped].sort(),
      });
    }
    for (const ref of dangling) {
      this.logger.warn(ref.message, ref.context);
    }

    const result: ImportResult = {
      elements: prepared.length,
      duplicates,
      relations: relations.length,
      replacedRelations,
      danglingReferences: dangling,
      unmappedAttributes: [...unmapped].sort(),
      coercionFailures: [...failures.values()],
      durationMs: Date.now() - startedAt,
    };
    this.logger.info('Import finished', {
      elements: result.elements,
      relations: result.relations,
      danglingReferences: dangling.length,
      durationMs: result.durationMs,
    });
    return result;
  }

  /** Declared types of the non-framework columns of both tables */
  private columnTypes(): ColumnTypes {
    const elementColumns = this.gateway.tableColumns(ELEMENTS_TABLE);
    const relationColumns = this.gateway.tableColumns(RELATIONS_TABLE);
    if (elementColumns.length === 0 || relationColumns.length === 0) {
      throw new ImportError({
        code: 'SCHEMA_MISSING',
        message: `The database has no "${ELEMENTS_TABLE}" or "${RELATIONS_TABLE}" table`,
        suggestion: 'Create the schema first with `sysml-sql init-db <db-file>`.',
      });
    }
    return {
      [ELEMENTS_TABLE]: new Map(
        elementColumns
          .filter((column) => column.name !== ID_COLUMN && column.name !== TYPE_COLUMN)
          .map((column) => [column.name, column.type])
      ),
      [RELATIONS_TABLE]: new Map(
        relationColumns
          .filter((column) => !RELATION_FRAMEWORK_COLUMNS.includes(column.name))
          .map((column) => [column.name, column.type])
      ),
    };
  }

  /**
   * Project an element onto the `elements` row and, for a relation-like
   * element with edges, onto the attribute columns of `relations`
   */
  private prepare(
    element: Element,
    columnTypes: ColumnTypes,
    unmapped: Set<string>,
    failures: Map<string, CoercionFailure>
  ): PreparedElement {
    const row: TableRow = { columns: [ID_COLUMN, TYPE_COLUMN], values: [element.id, element.type] };
    const attributes: TableRow = { columns: [], values: [] };
    const targets: Array<[typeof ELEMENTS_TABLE | typeof RELATIONS_TABLE, TableRow]> = [[ELEMENTS_TABLE, row]];
    if (this.relationTypes.has(element.type) && hasEdges(element)) {
      targets.push([RELATIONS_TABLE, attributes]);
    }

    for (const [name, value] of element.properties) {
      let mapped = false;
      for (const [table, target] of targets) {
        const columnType = columnTypes[table].get(name);
        if (columnType === undefined) continue;
        mapped = true;

        const coerced = coerceValue(value, columnType);
        target.columns.push(name);
        if (coerced.ok) {
          target.values.push(coerced.value);
          continue;
        }
        target.values.push(null);
        const key = `${table}.${name}`;
        const failure = failures.get(key);
        if (failure) {
          failure.count++;
        } else {
          failures.set(key, { table, column: name, columnType, count: 1, elementId: element.id });
        }
      }
      if (!mapped && value.kind !== 'reference') unmapped.add(name);
    }

    return { element, row, attributes };
  }

  /**
   * Relation rows to write, plus the references whose target is unknown
   *
   * A target is known when it is imported in this run or already stored.
   */
  private resolveRelations(
    prepared: readonly PreparedElement[],
    knownIds: ReadonlySet<string>
  ): { relations: RelationRow[]; dangling: ImportError[] } {
    const stored = new Map<string, boolean>();
    const isKnown = (id: string): boolean => {
      if (knownIds.has(id)) return true;
      let found = stored.get(id);
      if (found === undefined) {
        found = this.gateway.hasKey(ELEMENTS_TABLE, ID_COLUMN, id);
        stored.set(id, found);
      }
      return found;
    };

    const relations: RelationRow[] = [];
    const dangling: ImportError[] = [];
    for (const { element, attributes } of prepared) {
      const type = this.relationTypes.has(element.type) ? element.type : REFERENCE_RELATION_TYPE;
      for (const relation of lowerReferences(element, type)) {
        const row: RelationRow = {
          relation,
          columns: [...RELATION_FRAMEWORK_COLUMNS, ...attributes.columns],
          values: [relation.id, relation.type, relation.name, relation.originId, relation.targetId, ...attributes.values],
        };
        if (isKnown(relation.targetId)) {
          relations.push(row);
          continue;
        }
        dangling.push(
          ImportError.danglingReference({
            relationId: relation.id,
            originId: relation.originId,
            relationName: relation.name,
            targetId: relation.targetId,
          })
        );
        if (this.options.disableForeignKeyChecks) relations.push(row);
      }
    }
    return { relations, dangling };
  }

  /** Element rows first, so every relation finds its origin */
  private write(rows: readonly TableRow[], ids: readonly string[], relations: readonly RelationRow[]): number {
    const elementProgress = new ProgressReporter(this.logger, { unit: 'elements' });
    for (const row of rows) {
      this.gateway.upsert(ELEMENTS_TABLE, row.columns, row.values);
      elementProgress.add();
    }
    elementProgress.finish();

    const replaced = this.gateway.deleteWhereIn(RELATIONS_TABLE, RELATION_ORIGIN_COLUMN, ids);
    this.logger.debug('Deleted previous outgoing relations', { count: replaced });

    const relationProgress = new ProgressReporter(this.logger, { unit: 'relations' });
    for (const row of relations) {
      this.gateway.upsert(RELATIONS_TABLE, row.columns, row.values);
      relationProgress.add();
    }
    relationProgress.finish();
    return replaced;
  }

  /** Roll back and reset the tuning; neither failure replaces `cause` */
  private abort(cause: unknown, began: boolean): void {
    this.logger.error('Import failed', { error: errorMessage(cause), rollback: began });
    if (began) {
      try {
        this.gateway.rollback();
      } catch (err) {
        this.logger.error('Rollback failed', { error: errorMessage(err) });
      }
    }
    try {
      this.options.tuning?.after({ committed: false, vacuum: false });
    } catch (err) {
      this.logger.warn('Could not reset the database settings', { error: errorMessage(err) });
    }
  }
}
