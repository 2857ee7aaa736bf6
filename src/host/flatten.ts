/**
 * Reference scene-graph flattener
 *
 * Walks `elements` / `@elements` sequences and `definition` members, children
 * before their parent, yielding each record once.
 */

import type { Element } from '../core/types';

const CHILD_SEQUENCES = ['elements', '@elements'];

function isRecord(value: unknown): value is Element {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Map);
}

function childrenOf(node: Element): Element[] {
  const children: Element[] = [];

  for (const key of CHILD_SEQUENCES) {
    const sequence = node[key];
    if (Array.isArray(sequence)) {
      children.push(...sequence.filter(isRecord));
    }
  }

  const definition = node['definition'];
  if (isRecord(definition)) children.push(definition);

  return children;
}

export function flattenModel(root: Element): Element[] {
  const flat: Element[] = [];
  const seen = new Set<Element>();

  const visit = (node: Element): void => {
    if (seen.has(node)) return;
    seen.add(node);
    for (const child of childrenOf(node)) {
      visit(child);
    }
    flat.push(node);
  };

  visit(root);
  return flat;
}
