import type { FieldTable } from '../filter/types.js';
import { RequestParseError } from './errors.js';
import type { Paging, SortSpec } from './types.js';

function first(v: unknown): unknown {
  if (Array.isArray(v)) return v[0];
  return v;
}

function str(v: unknown): string | undefined {
  const x = first(v);
  if (x == null) return undefined;
  return String(x);
}

function parseIntSafe(v: unknown): number | undefined {
  const s = String(first(v) ?? '').trim();
  if (!s) return undefined;
  if (!/^-?\d+$/.test(s)) return undefined;
  const n = Number.parseInt(s, 10);
  if (!Number.isFinite(n)) return undefined;
  return n;
}

function isValidField(field: string): boolean {
  return /^[a-zA-Z_][a-zA-Z0-9_]*(\.[a-zA-Z_][a-zA-Z0-9_]*)?$/.test(field);
}

/**
 * `name,-createdAt` → [{ field: 'name', dir: 'asc' }, { field: 'createdAt', dir: 'desc' }].
 * Accepts the comma string or an already-split list. With `fields`, unknown fields are rejected.
 */
export function parseSort(sortParam: unknown, fields?: FieldTable): SortSpec[] {
  const parts = Array.isArray(sortParam)
    ? sortParam.map((x) => String(x).trim()).filter(Boolean)
    : (str(sortParam) ?? '')
        .split(',')
        .map((x) => x.trim())
        .filter(Boolean);

  const out: SortSpec[] = [];
  for (const p of parts) {
    const dir = p.startsWith('-') ? 'desc' : 'asc';
    const field = p.replace(/^[+-]/, '').trim();
    if (!field) continue;
    if (!isValidField(field)) throw new RequestParseError('sort', `Invalid sort field: ${field}`, field);
    if (fields && !fields.has(field)) throw new RequestParseError('sort', `Unknown sort field: ${field}`, field);
    out.push({ field, dir });
  }
  return out;
}

export type ParsePagingOptions = {
  defaultLimit?: number;
  maxLimit?: number;
  defaultPage?: number;
};

/** `limit=0` asks for every row; otherwise the limit is clamped to [1, maxLimit]. */
export function parsePaging(query: Record<string, unknown>, opts: ParsePagingOptions = {}): Paging {
  const defaultPage = opts.defaultPage ?? 1;
  const page = Math.max(1, parseIntSafe(query.page) ?? defaultPage);

  const defaultLimit = opts.defaultLimit ?? 50;
  const maxLimit = opts.maxLimit ?? 200;
  const limitRaw = parseIntSafe(query.limit);
  if (limitRaw === 0) return { page, offset: 0 };

  const limit = Math.max(1, Math.min(maxLimit, limitRaw ?? defaultLimit));
  return { page, limit, offset: (page - 1) * limit };
}
