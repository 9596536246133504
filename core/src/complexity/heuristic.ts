import { LIST_OPERATORS } from '../filter/operators.js';
import { isCustomField, type FilterExpression } from '../filter/types.js';
import type { ComplexityAnalysis, PreparedQuery } from './types.js';

export const HEURISTIC_WEIGHTS = {
  condition: 5,
  orBranch: 5,
  negation: 3,
  membershipList: 3,
  association: 10,
  sortField: 5,
  sortWithoutLimit: 20,
  noLimit: 20,
  deepOffset: 15,
  deepOffsetWithoutLimit: 30,
} as const;

export const DEEP_OFFSET = 1000;
export const COST_PER_POINT = 100;

export type HeuristicBreakdown = {
  conditions: number;
  orBranches: number;
  negations: number;
  membershipLists: number;
  associations: string[];
  customFragments: number;
  sortFields: number;
  limit: number | null;
  offset: number;
  total: number;
};

export type HeuristicOptions = {
  customFilterWeight: number;
};

function countExpression(query: PreparedQuery<unknown>) {
  const counts = { conditions: 0, orBranches: 0, negations: 0, membershipLists: 0, customFragments: 0 };
  const associations = new Set<string>();

  const visit = (e: FilterExpression): void => {
    switch (e.kind) {
      case 'or':
        counts.orBranches++;
        e.children.forEach(visit);
        return;
      case 'and':
        e.children.forEach(visit);
        return;
      case 'not':
        counts.negations++;
        visit(e.child);
        return;
      case 'leaf': {
        const field = query.fields.get(e.field);
        if (field?.association) associations.add(field.association);
        if (field && isCustomField(field)) {
          counts.customFragments += e.ops.length;
          return;
        }
        counts.conditions += e.ops.length;
        counts.membershipLists += e.ops.filter(([op]) => LIST_OPERATORS.has(op)).length;
      }
    }
  };
  visit(query.expression);
  return { ...counts, associations: [...associations].sort((a, b) => a.localeCompare(b)) };
}

export function heuristicBreakdown(query: PreparedQuery<unknown>, opts: HeuristicOptions): HeuristicBreakdown {
  const w = HEURISTIC_WEIGHTS;
  const counts = countExpression(query);
  const limit = query.limit ?? null;
  const offset = query.offset ?? 0;
  const sortFields = query.sort?.length ?? 0;

  let total =
    counts.conditions * w.condition +
    counts.orBranches * w.orBranch +
    counts.negations * w.negation +
    counts.membershipLists * w.membershipList +
    counts.associations.length * w.association +
    counts.customFragments * opts.customFilterWeight +
    sortFields * w.sortField;

  if (limit === null) {
    total += w.noLimit;
    if (sortFields) total += w.sortWithoutLimit;
  }
  if (offset > DEEP_OFFSET) total += limit === null ? w.deepOffsetWithoutLimit : w.deepOffset;

  return { ...counts, sortFields, limit, offset, total };
}

export function heuristicSuggestions(b: HeuristicBreakdown): string[] {
  const out: string[] = [];
  if (b.limit === null) out.push('Add a limit to bound the number of rows returned');
  if (b.offset > DEEP_OFFSET) out.push('Use cursor-based pagination instead of large offsets');
  if (b.orBranches > 3) out.push('Reduce the number of OR branches or replace them with an IN list');
  if (b.associations.length) out.push(`Filter on fewer associations (${b.associations.join(', ')})`);
  if (b.customFragments) out.push('Custom filters are expensive to estimate; combine them with selective conditions');
  if (b.total >= 50) out.push('Narrow the filter with more selective conditions');
  return out;
}

/** Structural estimate used when the backend cannot report a plan. */
export function analyzeHeuristically(query: PreparedQuery<unknown>, opts: HeuristicOptions): ComplexityAnalysis {
  const breakdown = heuristicBreakdown(query, opts);
  return Object.freeze({
    cost: breakdown.total * COST_PER_POINT,
    normalizedScore: Math.min(breakdown.total, 100),
    method: 'heuristic',
    suggestions: Object.freeze(heuristicSuggestions(breakdown)),
    rawDetails: Object.freeze({ ...breakdown }),
  });
}
