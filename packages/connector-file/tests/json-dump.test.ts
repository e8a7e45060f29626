import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ImportError } from '@sysml-sql/core';
import { createJsonDumpFile } from '../src/index.js';

let tmpDir = '';

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'connector-file-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = '';
});

async function importErrorOf(promise: Promise<unknown>): Promise<ImportError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ImportError) return err;
    throw err;
  }
  throw new Error('expected an ImportError');
}

describe('JsonDumpFile', () => {
  it('reads a dump with a UTF-8 BOM', async () => {
    const filePath = join(tmpDir, 'bom.json');
    writeFileSync(filePath, '\uFEFF[{"@id":"a","@type":"PartUsage"}]', 'utf-8');

    const records = await createJsonDumpFile({ filePath }).readElements();

    expect(records).toEqual([{ '@id': 'a', '@type': 'PartUsage' }]);
  });

  it('rejects documents whose root is not an array of objects', async () => {
    const objectRoot = join(tmpDir, 'object.json');
    writeFileSync(objectRoot, '{"elements": []}', 'utf-8');
    const scalarEntry = join(tmpDir, 'scalar.json');
    writeFileSync(scalarEntry, '[{"@id":"a","@type":"T"}, 1]', 'utf-8');

    const first = await importErrorOf(createJsonDumpFile({ filePath: objectRoot }).readElements());
    const second = await importErrorOf(createJsonDumpFile({ filePath: scalarEntry }).readElements());

    expect(first.code).toBe('MALFORMED_DOCUMENT');
    expect(second.code).toBe('MALFORMED_DOCUMENT');
    expect(second.message).toBe(`Entry #1 of ${scalarEntry} is not an object`);
  });

  it('reports missing files', async () => {
    const err = await importErrorOf(
      createJsonDumpFile({ filePath: join(tmpDir, 'missing.json') }).readElements()
    );

    expect(err.code).toBe('FILE_NOT_FOUND');
  });

  it('pretty prints with the configured indentation', async () => {
    const filePath = join(tmpDir, 'pretty.json');

    await createJsonDumpFile({ filePath, pretty: true }).writeElements([{ '@id': 'a', '@type': 'T' }]);

    expect(readFileSync(filePath, 'utf-8')).toBe('[\n  {\n    "@id": "a",\n    "@type": "T"\n  }\n]');
  });

  it('creates the dump on first append', async () => {
    const filePath = join(tmpDir, 'new.json');
    const records = [
      { '@id': 'a', '@type': 'PartDefinition' },
      { '@id': 'b', '@type': 'PartUsage' },
    ];

    const result = await createJsonDumpFile({ filePath }).appendElements(records);

    expect(result).toEqual({ total: 2, added: 2, duplicates: 0 });
    expect(readFileSync(filePath, 'utf-8')).toBe(JSON.stringify(records));
  });

  it('merges identical records regardless of key order', async () => {
    const filePath = join(tmpDir, 'merge.json');
    writeFileSync(
      filePath,
      JSON.stringify([
        { '@id': 'a', '@type': 'PartDefinition' },
        { '@id': 'b', '@type': 'PartUsage', declaredName: 'wheel' },
      ]),
      'utf-8'
    );

    const result = await createJsonDumpFile({ filePath }).appendElements([
      { declaredName: 'wheel', '@type': 'PartUsage', '@id': 'b' },
      { '@id': 'c', '@type': 'PartUsage' },
    ]);

    expect(result).toEqual({ total: 3, added: 1, duplicates: 1 });
    const written: Array<{ '@id': string }> = JSON.parse(readFileSync(filePath, 'utf-8'));
    expect(written.map((r) => r['@id'])).toEqual(['a', 'b', 'c']);
  });

  it('refuses conflicting records and leaves the dump untouched', async () => {
    const filePath = join(tmpDir, 'conflict.json');
    const original = JSON.stringify([{ '@id': 'a', '@type': 'PartUsage', declaredName: 'x' }]);
    writeFileSync(filePath, original, 'utf-8');

    const err = await importErrorOf(
      createJsonDumpFile({ filePath }).appendElements([
        { '@id': 'a', '@type': 'PartUsage', declaredName: 'y' },
      ])
    );

    expect(err.code).toBe('CONFLICTING_ELEMENTS');
    expect(err.context).toEqual({ id: 'a' });
    expect(readFileSync(filePath, 'utf-8')).toBe(original);
  });
});
