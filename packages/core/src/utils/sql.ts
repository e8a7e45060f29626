/**
 * SQL quoting helpers
 *
 * Column names come from an upstream schema (`@id`, `@type`, camelCase names), so
 * every identifier is double-quoted.
 */

export function escapeSqlIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
