import type { Operator } from './operators.js';
import type { AndNode, FilterExpression, FilterValue, LeafNode, NotNode, OrNode } from './types.js';

export function and(children: readonly FilterExpression[]): AndNode {
  return Object.freeze({ kind: 'and', children: Object.freeze([...children]) });
}

export function or(children: readonly FilterExpression[]): OrNode {
  return Object.freeze({ kind: 'or', children: Object.freeze([...children]) });
}

export function not(child: FilterExpression): NotNode {
  return Object.freeze({ kind: 'not', child });
}

export function leaf(field: string, ops: ReadonlyArray<readonly [Operator, FilterValue]>): LeafNode {
  return Object.freeze({
    kind: 'leaf',
    field,
    ops: Object.freeze(ops.map(([op, value]) => Object.freeze([op, value] as const))),
  });
}

/** Shorthand for a single-operator leaf. */
export function cond(field: string, op: Operator, value: FilterValue): LeafNode {
  return leaf(field, [[op, value]]);
}

/** Distinct leaf fields in first-seen order. */
export function fieldsOf(expr: FilterExpression): string[] {
  const seen = new Set<string>();
  const visit = (e: FilterExpression): void => {
    switch (e.kind) {
      case 'leaf':
        seen.add(e.field);
        return;
      case 'not':
        visit(e.child);
        return;
      default:
        e.children.forEach(visit);
    }
  };
  visit(expr);
  return [...seen];
}
