import type { Operator } from '../filter/operators.js';
import type { FilterValue } from '../filter/types.js';

/** Builds the backend query for a field whose filtering is application-defined. */
export type CustomFilter<Q> = (query: Q, operator: Operator, value: FilterValue) => Q;

export class CustomFilterRegistry<Q> {
  private readonly filters = new Map<string, CustomFilter<Q>>();

  constructor(entries: Record<string, CustomFilter<Q>> = {}) {
    for (const [field, fn] of Object.entries(entries)) this.register(field, fn);
  }

  register(field: string, fn: CustomFilter<Q>): this {
    if (!field) throw new Error('Custom filter field is required');
    if (this.filters.has(field)) throw new Error(`Custom filter already registered: ${field}`);
    this.filters.set(field, fn);
    return this;
  }

  get(field: string): CustomFilter<Q> | undefined {
    return this.filters.get(field);
  }

  has(field: string): boolean {
    return this.filters.has(field);
  }
}
