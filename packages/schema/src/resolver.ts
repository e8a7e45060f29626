/**
 * Schema Resolver
 *
 * Turns a JSON-Schema document (`$defs` of a self-referential, polymorphic model
 * description) into a flat map of resolved definitions. Inheritance (`allOf`
 * members and `$ref` aliases) is resolved depth-first with an explicit stack;
 * field references to other definitions are recorded by name only.
 */

import {
  DEFAULT_POLYMORPHIC_FIELDS,
  SCHEMA_VALUED_KEYWORDS,
  SchemaError,
  TYPE_COLUMN,
  UNSUPPORTED_SCHEMA_KEYWORDS,
  formatZodIssues,
  schemaDocumentSchema,
  type DefinitionKind,
  type FieldDescriptor,
  type FieldKind,
  type ItemDescriptor,
  type Logger,
  type ResolvedSchema,
  type SchemaDefinition,
  type SchemaNode,
} from '@sysml-sql/core';

export interface ResolveOptions {
  /** Fields allowed to hold values of several kinds (default: `["value"]`) */
  polymorphicFields?: readonly string[];
  logger?: Logger;
}

type ResolutionState = 'in-progress' | 'done';

/** Building blocks of a definition, in merge order */
type Part =
  | { kind: 'fields'; fields: FieldDescriptor[] }
  | { kind: 'ref'; name: string };

interface Analysis {
  kind: DefinitionKind;
  parts: Part[];
  /** Names this definition needs the field set of */
  supertypes: string[];
  /** Set when the definition is nothing but a `$ref` */
  aliasOf?: string;
  discriminator?: string;
  variants?: string[];
  scalarKind?: FieldKind;
}

interface FieldShape {
  kind: FieldKind;
  nullable: boolean;
  ref?: string;
  variants?: string[];
  items?: ItemDescriptor;
}

const SCALAR_TYPES: ReadonlySet<string> = new Set(['string', 'number', 'integer', 'boolean']);

function isNullNode(node: SchemaNode): boolean {
  if (node.type === 'null') return true;
  return Array.isArray(node.type) && node.type.length === 1 && node.type[0] === 'null';
}

function isPureRef(node: SchemaNode): node is SchemaNode & { $ref: string } {
  return (
    node.$ref !== undefined &&
    node.type === undefined &&
    node.properties === undefined &&
    node.allOf === undefined &&
    node.anyOf === undefined &&
    node.oneOf === undefined
  );
}

function kindOfConstant(value: unknown): FieldKind | undefined {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return undefined;
}

function isEmpty(value: unknown): boolean {
  if (Array.isArray(value)) return value.length === 0;
  return typeof value === 'object' && value !== null && Object.keys(value).length === 0;
}

/**
 * First keyword under `node` that may declare fields the resolver cannot map,
 * with the path to it
 */
function findUnsupportedKeyword(node: SchemaNode, path: string[] = []): string[] | undefined {
  for (const keyword of UNSUPPORTED_SCHEMA_KEYWORDS) {
    const value = node[keyword];
    if (value !== undefined && !isEmpty(value)) return [...path, keyword];
  }
  for (const keyword of SCHEMA_VALUED_KEYWORDS) {
    const value = node[keyword];
    if (value !== undefined && typeof value !== 'boolean') return [...path, keyword];
  }

  const children: Array<[string[], SchemaNode]> = [];
  for (const [name, child] of Object.entries(node.properties ?? {})) {
    children.push([['properties', name], child]);
  }
  if (node.items) children.push([['items'], node.items]);
  for (const keyword of ['allOf', 'anyOf', 'oneOf'] as const) {
    node[keyword]?.forEach((member, index) => children.push([[keyword, String(index)], member]));
  }
  for (const [segments, child] of children) {
    const found = findUnsupportedKeyword(child, [...path, ...segments]);
    if (found) return found;
  }
  return undefined;
}

function decodePointerSegment(segment: string): string {
  return decodeURIComponent(segment).replace(/~1/g, '/').replace(/~0/g, '~');
}

function lastSegment(value: string): string {
  const trimmed = value.replace(/\/+$/, '');
  const index = trimmed.lastIndexOf('/');
  return index === -1 ? trimmed : trimmed.slice(index + 1);
}

class SchemaResolver {
  private readonly nodes: Map<string, SchemaNode>;
  private readonly idIndex = new Map<string, string>();
  private readonly analyses = new Map<string, Analysis>();
  private readonly polymorphic: ReadonlySet<string>;

  constructor(nodes: Map<string, SchemaNode>, options: ResolveOptions) {
    this.nodes = nodes;
    this.polymorphic = new Set(options.polymorphicFields ?? DEFAULT_POLYMORPHIC_FIELDS);
    for (const [name, node] of nodes) {
      if (node.$id) this.idIndex.set(node.$id, name);
    }
  }

  resolve(): ResolvedSchema {
    const names = [...this.nodes.keys()].sort();
    const state = new Map<string, ResolutionState>();
    const resolved = new Map<string, SchemaDefinition>();

    for (const root of names) {
      if (state.get(root) === 'done') continue;

      const stack: Array<{ name: string; deps: string[]; next: number }> = [
        { name: root, deps: this.analyze(root).supertypes, next: 0 },
      ];
      state.set(root, 'in-progress');

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        if (!frame) break;

        if (frame.next < frame.deps.length) {
          const dep = frame.deps[frame.next++];
          if (dep === undefined) continue;
          const depState = state.get(dep);
          if (depState === 'done') continue;
          if (depState === 'in-progress') {
            const start = stack.findIndex((f) => f.name === dep);
            throw SchemaError.cyclicInheritance([...stack.slice(start).map((f) => f.name), dep]);
          }
          state.set(dep, 'in-progress');
          stack.push({ name: dep, deps: this.analyze(dep).supertypes, next: 0 });
          continue;
        }

        resolved.set(frame.name, this.build(frame.name, resolved));
        state.set(frame.name, 'done');
        stack.pop();
      }
    }

    const definitions = new Map<string, SchemaDefinition>();
    for (const name of names) {
      const definition = resolved.get(name);
      if (definition) definitions.set(name, definition);
    }
    return { definitions };
  }

  /**
   * Resolve a `$ref` to a definition name
   *
   * Accepts `#/$defs/Name`, `#/definitions/Name`, a definition's `$id`, and any
   * URI whose last path segment names a definition.
   */
  refToName(ref: string, from: string): string {
    const byId = this.idIndex.get(ref);
    if (byId !== undefined) return byId;

    const hash = ref.indexOf('#');
    if (hash !== -1) {
      const pointer = ref.slice(hash + 1);
      const match = /^\/(?:\$defs|definitions)\/(.+)$/.exec(pointer);
      if (match?.[1] !== undefined) {
        const name = decodePointerSegment(match[1]);
        if (this.nodes.has(name)) return name;
      }
      const base = ref.slice(0, hash);
      if (base && this.nodes.has(lastSegment(base))) return lastSegment(base);
    } else if (this.nodes.has(lastSegment(ref))) {
      return lastSegment(ref);
    }

    throw new SchemaError({
      code: 'UNRESOLVED_REFERENCE',
      message: `Definition "${from}" references unknown type "${ref}"`,
      suggestion: 'Check that the schema document contains every referenced definition.',
      context: { ref, from },
    });
  }

  private node(name: string): SchemaNode {
    const node = this.nodes.get(name);
    if (!node) {
      throw new SchemaError({
        code: 'UNRESOLVED_REFERENCE',
        message: `Unknown definition "${name}"`,
        context: { ref: name },
      });
    }
    return node;
  }

  private analyze(name: string): Analysis {
    const cached = this.analyses.get(name);
    if (cached) return cached;

    const node = this.node(name);
    const unsupported = findUnsupportedKeyword(node);
    if (unsupported) {
      const keyword = unsupported[unsupported.length - 1];
      throw new SchemaError({
        code: 'UNSUPPORTED_COMBINATOR',
        message: `Definition "${name}" uses "${keyword}" at ${['#', ...unsupported].join('/')}, which cannot be mapped to columns`,
        suggestion: 'Rewrite the definition with properties, allOf, $ref and unions of $refs only.',
        context: { definition: name, keyword, path: unsupported.join('/') },
      });
    }
    let analysis: Analysis;

    if (isPureRef(node)) {
      const target = this.refToName(node.$ref, name);
      analysis = {
        kind: 'object',
        parts: [{ kind: 'ref', name: target }],
        supertypes: [target],
        aliasOf: target,
      };
    } else if (node.anyOf || node.oneOf) {
      analysis = this.analyzeUnion(name, node);
    } else if (this.isScalarNode(node)) {
      analysis = { kind: 'scalar', parts: [], supertypes: [], scalarKind: this.scalarKindOf(name, node) };
    } else if (node.type === 'object' || node.properties || node.allOf || node.$ref) {
      const parts: Part[] = [];
      this.collectParts(name, node, parts);
      const supertypes: string[] = [];
      for (const part of parts) {
        if (part.kind === 'ref' && !supertypes.includes(part.name)) supertypes.push(part.name);
      }
      analysis = {
        kind: 'object',
        parts,
        supertypes,
        discriminator: this.discriminatorOf(node),
      };
    } else {
      throw new SchemaError({
        code: 'UNSUPPORTED_TYPE',
        message: `Definition "${name}" has no type this resolver can map`,
        suggestion: 'Definitions must be objects, scalars, $ref aliases, allOf merges or unions of $refs.',
        context: { definition: name },
      });
    }

    this.analyses.set(name, analysis);
    return analysis;
  }

  private analyzeUnion(name: string, node: SchemaNode): Analysis {
    const members = node.anyOf ?? node.oneOf ?? [];
    const variants: string[] = [];
    for (const member of members) {
      if (isNullNode(member)) continue;
      if (!isPureRef(member)) {
        throw new SchemaError({
          code: 'UNSUPPORTED_COMBINATOR',
          message: `Definition "${name}" is a union with a member that is not a $ref`,
          suggestion: 'Only unions of $ref members are supported at definition level.',
          context: { definition: name },
        });
      }
      variants.push(this.refToName(member.$ref, name));
    }
    return { kind: 'union', parts: [], supertypes: [], variants };
  }

  private isScalarNode(node: SchemaNode): boolean {
    if (node.properties || node.allOf || node.$ref) return false;
    if (typeof node.type === 'string') return SCALAR_TYPES.has(node.type);
    if (Array.isArray(node.type)) {
      const nonNull = node.type.filter((t) => t !== 'null');
      return nonNull.length === 1 && SCALAR_TYPES.has(nonNull[0] ?? '');
    }
    return node.const !== undefined || node.enum !== undefined;
  }

  private scalarKindOf(name: string, node: SchemaNode): FieldKind {
    const shape = this.fieldShape(name, name, node);
    return shape.kind;
  }

  private discriminatorOf(node: SchemaNode): string | undefined {
    const tag = node.properties?.[TYPE_COLUMN];
    if (tag) {
      if (typeof tag.const === 'string') return tag.const;
      if (tag.enum?.length === 1 && typeof tag.enum[0] === 'string') return tag.enum[0];
    }
    for (const member of node.allOf ?? []) {
      if (isPureRef(member)) continue;
      const inherited = this.discriminatorOf(member);
      if (inherited !== undefined) return inherited;
    }
    return undefined;
  }

  /**
   * Own properties first, then a `$ref`, then `allOf` members in order
   */
  private collectParts(name: string, node: SchemaNode, parts: Part[]): void {
    if (node.properties) {
      const required = new Set(node.required ?? []);
      const fields: FieldDescriptor[] = [];
      for (const [fieldName, fieldNode] of Object.entries(node.properties)) {
        fields.push({
          name: fieldName,
          declaredIn: name,
          required: required.has(fieldName),
          ...this.fieldShape(name, fieldName, fieldNode),
        });
      }
      parts.push({ kind: 'fields', fields });
    }

    if (node.$ref) {
      parts.push({ kind: 'ref', name: this.refToName(node.$ref, name) });
    }

    for (const member of node.allOf ?? []) {
      if (isPureRef(member)) {
        parts.push({ kind: 'ref', name: this.refToName(member.$ref, name) });
        continue;
      }
      if (member.anyOf || member.oneOf) {
        throw new SchemaError({
          code: 'UNSUPPORTED_COMBINATOR',
          message: `Definition "${name}" merges a union through allOf`,
          suggestion: 'allOf members must be $refs or inline object schemas.',
          context: { definition: name },
        });
      }
      this.collectParts(name, member, parts);
    }
  }

  private fieldShape(definition: string, field: string, node: SchemaNode): FieldShape {
    const unsupported = (message: string): SchemaError =>
      new SchemaError({
        code: 'UNSUPPORTED_TYPE',
        message: `Field "${field}" of "${definition}": ${message}`,
        suggestion: this.polymorphic.has(field)
          ? undefined
          : `If "${field}" legitimately holds values of several kinds, declare it polymorphic.`,
        context: { definition, field },
      });

    if (node.$ref) {
      return { kind: 'reference', nullable: false, ref: this.refToName(node.$ref, definition) };
    }

    if (node.allOf) {
      const [only, ...rest] = node.allOf;
      if (only && rest.length === 0 && node.type === undefined) {
        return this.fieldShape(definition, field, only);
      }
      throw new SchemaError({
        code: 'UNSUPPORTED_COMBINATOR',
        message: `Field "${field}" of "${definition}" merges several schemas through allOf`,
        context: { definition, field },
      });
    }

    const members = node.oneOf ?? node.anyOf;
    if (members) {
      const nonNull = members.filter((m) => !isNullNode(m));
      const nullable = nonNull.length < members.length;
      const [first] = nonNull;
      if (!first) throw unsupported('a union of nothing but null');
      if (nonNull.length === 1) {
        const shape = this.fieldShape(definition, field, first);
        return { ...shape, nullable: shape.nullable || nullable };
      }
      if (nonNull.every(isPureRef)) {
        const variants = nonNull.map((m) => this.refToName(m.$ref ?? '', definition));
        return { kind: 'reference', nullable, variants };
      }
      if (this.polymorphic.has(field)) {
        return { kind: 'any', nullable: true };
      }
      throw new SchemaError({
        code: 'UNSUPPORTED_COMBINATOR',
        message: `Field "${field}" of "${definition}" is a union of different kinds`,
        suggestion: `Declare "${field}" polymorphic if it legitimately holds values of several kinds.`,
        context: { definition, field },
      });
    }

    let nullable = false;
    let type: string | undefined;
    if (Array.isArray(node.type)) {
      const nonNull = node.type.filter((t) => t !== 'null');
      nullable = nonNull.length < node.type.length;
      if (nonNull.length > 1) {
        if (this.polymorphic.has(field)) return { kind: 'any', nullable: true };
        throw new SchemaError({
          code: 'UNSUPPORTED_COMBINATOR',
          message: `Field "${field}" of "${definition}" has several types: ${nonNull.join(', ')}`,
          context: { definition, field },
        });
      }
      type = nonNull[0];
    } else {
      type = node.type;
    }

    switch (type) {
      case 'string':
      case 'number':
      case 'integer':
      case 'boolean':
      case 'object':
        return { kind: type, nullable };
      case 'array': {
        if (!node.items) return { kind: 'array', nullable };
        const item = this.fieldShape(definition, field, node.items);
        const items: ItemDescriptor = { kind: item.kind };
        if (item.ref !== undefined) items.ref = item.ref;
        if (item.variants !== undefined) items.variants = item.variants;
        return { kind: 'array', nullable, items };
      }
      case undefined:
        break;
      default:
        throw unsupported(`type "${type}" is not supported`);
    }

    const constant = node.const ?? (node.enum?.length ? node.enum[0] : undefined);
    const constantKind = kindOfConstant(constant);
    if (constantKind) return { kind: constantKind, nullable };
    if (node.properties) return { kind: 'object', nullable };
    if (this.polymorphic.has(field)) return { kind: 'any', nullable: true };

    throw unsupported('the schema declares no type');
  }

  private build(name: string, resolved: ReadonlyMap<string, SchemaDefinition>): SchemaDefinition {
    const analysis = this.analyze(name);
    const node = this.node(name);

    const fields: FieldDescriptor[] = [];
    const seen = new Set<string>();
    const ancestors = new Set<string>();

    const addField = (field: FieldDescriptor): void => {
      if (seen.has(field.name)) return;
      seen.add(field.name);
      fields.push(field);
    };

    for (const part of analysis.parts) {
      if (part.kind === 'fields') {
        part.fields.forEach(addField);
        continue;
      }
      const parent = resolved.get(part.name);
      if (!parent) {
        throw new SchemaError({
          code: 'UNRESOLVED_REFERENCE',
          message: `Definition "${name}" inherits from unresolved "${part.name}"`,
          context: { definition: name, ref: part.name },
        });
      }
      parent.fields.forEach(addField);
      ancestors.add(part.name);
      parent.ancestors.forEach((ancestor) => ancestors.add(ancestor));
    }

    const alias = analysis.aliasOf !== undefined ? resolved.get(analysis.aliasOf) : undefined;
    const definition: SchemaDefinition = {
      name,
      id: node.$id,
      title: node.title,
      kind: alias ? alias.kind : analysis.kind,
      fields,
      supertypes: analysis.supertypes,
      ancestors: [...ancestors],
      discriminator: analysis.discriminator,
      variants: alias ? alias.variants : analysis.variants,
      scalarKind: alias ? alias.scalarKind : analysis.scalarKind,
    };
    return definition;
  }
}

/**
 * Resolve every definition of a JSON-Schema document
 *
 * @throws SchemaError on malformed documents, unresolvable references,
 * unsupported combinators and cyclic inheritance
 */
export function resolveSchema(document: unknown, options: ResolveOptions = {}): ResolvedSchema {
  const parsed = schemaDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new SchemaError({
      code: 'INVALID_SCHEMA',
      message: formatZodIssues('Invalid JSON schema document', parsed.error),
      suggestion: 'Pass the JSON schema served by the SysML v2 API (a document with "$defs").',
    });
  }

  const nodes = new Map<string, SchemaNode>();
  for (const defs of [parsed.data.$defs, parsed.data.definitions]) {
    for (const [name, node] of Object.entries(defs ?? {})) {
      if (!nodes.has(name)) nodes.set(name, node);
    }
  }

  const result = new SchemaResolver(nodes, options).resolve();
  options.logger?.debug('Resolved schema definitions', { definitions: result.definitions.size });
  return result;
}
