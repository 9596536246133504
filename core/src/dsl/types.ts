import { isPlainObject } from '../filter/values.js';

export type DslFieldSpec = {
  type?: string;
  label?: string;
  /** Stored as a list of `type` values. */
  multi?: boolean;
  /** Enum values: a list, or external → stored mapping. */
  values?: string[] | Record<string, string | number>;
  /** `'custom'` routes the field through a registered custom filter; `false` hides it from filtering. */
  filter?: 'custom' | false;
  columnName?: string;
  save?: boolean;

  /** Model this field references; its fields become filterable as `<as>.<field>`. */
  source?: string;
  as?: string;
};

export type DslModelSpec = {
  table?: string;
  fields: Record<string, DslFieldSpec>;
  filter?: {
    /** Base complexity limit for queries on this model. */
    complexityLimit?: number;
  };
};

export type DslRoot = {
  $schema?: string;
  [key: string]: unknown;
};

export function isDslModelSpec(v: unknown): v is DslModelSpec {
  return isPlainObject(v) && isPlainObject(v.fields);
}
