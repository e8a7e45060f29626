/**
 * JSON value types shared by the fetcher, the dump files and the importer
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = {
  [key: string]: JsonValue;
};
