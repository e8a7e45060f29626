import { REFERENCE_RELATION_TYPE, type Element, type Relation } from '@sysml-sql/core';

/** Deterministic id of the edge `name` from `originId` to `targetId` */
export function relationId(originId: string, name: string, targetId: string): string {
  return `${originId}/${name}/${targetId}`;
}

/**
 * One relation per directed reference the element carries
 *
 * A target listed twice under one property yields a single edge. Edges of a
 * relation-like element are typed with its own `@type` instead of `Reference`.
 */
export function lowerReferences(element: Element, type: string = REFERENCE_RELATION_TYPE): Relation[] {
  const relations = new Map<string, Relation>();
  for (const [name, value] of element.properties) {
    if (value.kind !== 'reference') continue;
    for (const targetId of value.targets) {
      const id = relationId(element.id, name, targetId);
      relations.set(id, {
        id,
        type,
        name,
        originId: element.id,
        targetId,
      });
    }
  }
  return [...relations.values()];
}
