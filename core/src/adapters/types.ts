import type { AdapterCapabilities, AdapterId } from '../capabilities/types.js';
import type { Explainer } from '../complexity/types.js';
import type { Operator } from '../filter/operators.js';
import type { FieldDescriptor, FilterValue } from '../filter/types.js';

export type AdapterFamily = 'relational' | 'search' | 'memory';

/**
 * Translates filter conditions into one backend's native query form `Q`.
 * `applyOperator` returns `query AND (field operator value)`.
 */
export interface FilterAdapter<Q> {
  readonly id: AdapterId;
  readonly family: AdapterFamily;
  /** Present when the backend can report a query plan. */
  readonly explainer?: Explainer<Q>;

  capabilities(): AdapterCapabilities;
  empty(): Q;
  matchAll(): Q;
  matchNone(): Q;
  applyOperator(query: Q, field: FieldDescriptor, operator: Operator, value: FilterValue): Q;
  combineAnd(queries: readonly Q[]): Q;
  combineOr(queries: readonly Q[]): Q;
  negate(query: Q): Q;
}
