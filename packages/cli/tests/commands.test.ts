import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import type { HttpRequest, HttpResponse, HttpTransport } from '@sysml-sql/connector-api';
import { SqliteClient } from '@sysml-sql/connector-db';
import { createProgram, type ProgramOptions } from '../src/program.js';
import { formatRows } from '../src/commands/query.js';

const MODEL = [
  { '@id': 'A', '@type': 'PartDefinition', declaredName: 'Vehicle', isLibraryElement: false },
  { '@id': 'B', '@type': 'PartUsage', declaredName: 'car', definition: [{ '@id': 'A' }], isLibraryElement: false },
  { '@id': 'C', '@type': 'PartUsage', declaredName: 'wheel', owner: { '@id': 'B' }, isLibraryElement: true },
];

const BASE = 'https://sysml.test/api';

function exampleQuery(name: string): string {
  return fileURLToPath(new URL(`../examples/queries/${name}`, import.meta.url));
}

/** Answers GET requests from a fixed map; unknown URLs get a 404 */
class MapTransport implements HttpTransport {
  readonly urls: string[] = [];

  constructor(private readonly replies: Record<string, { body: unknown; link?: string }>) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    this.urls.push(request.url);
    const reply = this.replies[request.url];
    return {
      status: reply ? 200 : 404,
      headers: { get: (name) => (name.toLowerCase() === 'link' ? reply?.link ?? null : null) },
      text: async () => (reply ? JSON.stringify(reply.body) : 'not found'),
    };
  }
}

let tmpDir = '';
let db = '';
let out: string[] = [];
let logs: string[] = [];

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'cli-'));
  db = join(tmpDir, 'model.db');
  out = [];
  logs = [];
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  tmpDir = '';
});

async function run(args: string[], options: ProgramOptions = {}): Promise<void> {
  const program = createProgram({
    out: (line) => void out.push(line),
    logSink: (line) => void logs.push(line),
    env: {},
    ...options,
  });
  await program.parseAsync(args, { from: 'user' });
}

function writeModel(records: unknown[] = MODEL): string {
  const file = join(tmpDir, 'model.json');
  writeFileSync(file, JSON.stringify(records), 'utf-8');
  return file;
}

describe('init-db', () => {
  it('creates the bundled schema and can run again', async () => {
    await run(['init-db', db]);
    await run(['init-db', db]);

    expect(out).toEqual([
      `Schema ready in ${db}: 21 element columns, 5 relation columns`,
      `Schema ready in ${db}: 21 element columns, 5 relation columns`,
    ]);
  });
});

describe('import-json and query', () => {
  it('imports the three-element model and answers the owner join', async () => {
    await run(['init-db', db]);
    await run(['import-json', db, writeModel()]);
    out = [];

    await run(['query', db, exampleQuery('ElementsWithOwnerType.sql')]);

    expect(out).toEqual(['Owner\tElement\tType', 'car\twheel\tVehicle']);
  });

  it('prints the import summary', async () => {
    await run(['init-db', db]);
    await run(['import-json', db, writeModel([...MODEL, { '@id': 'D', '@type': 'PartUsage', owner: { '@id': 'Z' } }])]);

    expect(out[1]).toMatch(new RegExp(`^Imported 4 elements and 2 relations into ${db.replace(/[.\\]/g, '\\$&')} in \\d+ms$`));
    expect(out[2]).toBe('  1 references to unknown elements');
    expect(out).toHaveLength(3);
    expect(logs.filter((line) => line.includes(' WARN Relation '))).toEqual([
      expect.stringMatching(
        / WARN Relation "owner" of element D targets unknown element Z command=import-json relationId=D\/owner\/Z originId=D relationName=owner targetId=Z\n$/
      ),
    ]);
  });

  it('collects the usages of definitions with their owners', async () => {
    await run(['init-db', db]);
    await run([
      'import-json',
      db,
      writeModel([
        MODEL[0],
        MODEL[1],
        { '@id': 'W', '@type': 'PartDefinition', declaredName: 'Wheel' },
        { ...MODEL[2], definition: [{ '@id': 'W' }] },
      ]),
    ]);
    out = [];

    await run(['query', db, exampleQuery('GetStructureElements.sql')]);

    expect(out).toEqual(['Owner\tElement Name\tType Name', 'car\twheel\tWheel']);
  });

  it('lists the parts outside the library', async () => {
    await run(['init-db', db]);
    await run(['import-json', db, writeModel()]);
    out = [];

    await run(['query', db, exampleQuery('SelectPartsExceptLibrary.sql')]);

    expect(out).toEqual(['declaredName\t@type\t@id', 'Vehicle\tPartDefinition\tA', 'car\tPartUsage\tB']);
  });

  it('fails with a schema hint on an uninitialised database', async () => {
    await expect(run(['import-json', db, writeModel()])).rejects.toMatchObject({ code: 'SCHEMA_MISSING' });
  });
});

describe('json-schema-to-sql-schema', () => {
  it('writes the DDL without touching the database', async () => {
    const schemaFile = join(tmpDir, 'schema.json');
    const ddlFile = join(tmpDir, 'schema.sql');
    writeFileSync(
      schemaFile,
      JSON.stringify({
        $defs: {
          Identified: { type: 'object', properties: { '@id': { type: 'string' } } },
          Part: {
            type: 'object',
            properties: {
              '@id': { type: 'string' },
              '@type': { const: 'Part' },
              mass: { type: 'number' },
              owner: { $ref: '#/$defs/Identified' },
            },
          },
        },
      }),
      'utf-8'
    );

    await run(['json-schema-to-sql-schema', db, schemaFile, '--dump-sql', ddlFile, '--no-init']);

    expect(readFileSync(ddlFile, 'utf-8')).toContain('\t"mass" REAL\n) STRICT;');
    expect(out).toEqual([
      `Wrote DDL to ${ddlFile}`,
      'Generated 3 element columns and 5 relation columns; 1 properties become relations',
    ]);
  });

  it('applies the DDL by default', async () => {
    const schemaFile = join(tmpDir, 'schema.json');
    writeFileSync(
      schemaFile,
      JSON.stringify({ $defs: { Part: { type: 'object', properties: { '@type': { const: 'Part' }, mass: { type: 'number' } } } } }),
      'utf-8'
    );

    await run(['json-schema-to-sql-schema', db, schemaFile]);

    const client = new SqliteClient({ path: db });
    try {
      expect(client.tableColumns('elements').map((column) => `${column.name}:${column.type}`)).toEqual([
        '@id:TEXT',
        '@type:TEXT',
        'mass:REAL',
      ]);
    } finally {
      client.close();
    }
  });
});

describe('fetch', () => {
  const transport = () =>
    new MapTransport({
      [`${BASE}/projects/p1`]: { body: { '@id': 'p1', name: 'Drone', defaultBranch: { '@id': 'b1' } } },
      [`${BASE}/projects/p1/branches/b1`]: {
        body: { '@id': 'b1', name: 'main', head: { '@id': 'c9' } },
      },
      [`${BASE}/projects/p1/commits/c9/elements`]: {
        body: MODEL.slice(0, 2),
        link: `<${BASE}/projects/p1/commits/c9/elements?page[after]=B>; rel="next"`,
      },
      [`${BASE}/projects/p1/commits/c9/elements?page[after]=B`]: { body: MODEL.slice(2) },
    });

  it('fetches the default branch head, dumps and imports it', async () => {
    const dump = join(tmpDir, 'dump.json');
    await run(['init-db', db]);
    out = [];

    await run(['fetch', db, BASE, '--project-id', 'p1', '--dump-json', dump], { transport: transport() });

    expect(out.slice(0, 2)).toEqual([
      'Fetched 3 elements of project "Drone" (p1), commit c9',
      `Wrote 3 elements to ${dump}`,
    ]);
    expect(out[2]).toMatch(/^Imported 3 elements and 2 relations into /);
    expect(JSON.parse(readFileSync(dump, 'utf-8'))).toEqual(MODEL);
  });

  it('only dumps with --no-import', async () => {
    const dump = join(tmpDir, 'dump.json');
    const fake = transport();

    await run(['fetch', db, BASE, '--project-id', 'p1', '-d', dump, '--no-import'], { transport: fake });

    expect(out).toEqual(['Fetched 3 elements of project "Drone" (p1), commit c9', `Wrote 3 elements to ${dump}`]);
    expect(fake.urls).toEqual([
      `${BASE}/projects/p1`,
      `${BASE}/projects/p1/branches/b1`,
      `${BASE}/projects/p1/commits/c9/elements`,
      `${BASE}/projects/p1/commits/c9/elements?page[after]=B`,
    ]);
  });

  it('requires a project', async () => {
    await expect(run(['fetch', db, BASE], { transport: transport() })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      message: 'No project given',
    });
  });

  it('rejects conflicting commit selectors', async () => {
    await expect(
      run(['fetch', db, BASE, '--project-id', 'p1', '--commit-id', 'c1', '--branch-name', 'main'], {
        transport: transport(),
      })
    ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });
});

describe('formatRows', () => {
  it('prints NULL, escapes tabs and says when nothing matched', () => {
    expect(formatRows([{ a: null, b: 'x\ty', c: 2 }])).toEqual(['a\tb\tc', 'NULL\tx\\ty\t2']);
    expect(formatRows([])).toEqual(['(no rows)']);
  });
});
