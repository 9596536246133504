import { FilterParseError } from './errors.js';
import type { FilterValue, GeoDistance, Scalar } from './types.js';

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (!v || typeof v !== 'object' || Array.isArray(v)) return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

export function isScalar(v: FilterValue): v is Scalar {
  return v === null || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean';
}

export function isValueList(v: FilterValue): v is readonly FilterValue[] {
  return Array.isArray(v);
}

export function isValueRecord(v: FilterValue): v is { readonly [key: string]: FilterValue } {
  return v !== null && typeof v === 'object' && !Array.isArray(v);
}

/** Converts untrusted input into a FilterValue, or throws a structural error. */
export function toFilterValue(v: unknown, path: string): FilterValue {
  if (v === null || typeof v === 'string' || typeof v === 'boolean') return v;
  if (typeof v === 'number') {
    if (!Number.isFinite(v)) throw new FilterParseError(`Non-finite number at ${path}`, { path });
    return v;
  }
  if (v instanceof Date) return v.toISOString();
  if (Array.isArray(v)) return v.map((item, i) => toFilterValue(item, `${path}[${i}]`));
  if (isPlainObject(v)) {
    const out: Record<string, FilterValue> = {};
    for (const [k, item] of Object.entries(v)) out[k] = toFilterValue(item, `${path}.${k}`);
    return out;
  }
  throw new FilterParseError(`Unsupported value at ${path}`, { path, type: typeof v });
}

export function asScalar(v: FilterValue, field: string): Scalar {
  if (isScalar(v)) return v;
  throw new FilterParseError(`Expected a scalar value for ${field}`, { field });
}

export function asString(v: FilterValue, field: string): string {
  if (typeof v === 'string') return v;
  throw new FilterParseError(`Expected a string value for ${field}`, { field });
}

export function asBoolean(v: FilterValue, field: string): boolean {
  if (typeof v === 'boolean') return v;
  throw new FilterParseError(`Expected a boolean value for ${field}`, { field });
}

export function asScalarList(v: FilterValue, field: string): Scalar[] {
  if (!isValueList(v)) throw new FilterParseError(`Expected a list value for ${field}`, { field });
  return v.map((item) => asScalar(item, field));
}

export function asGeoDistance(v: FilterValue, field: string): GeoDistance {
  if (isValueRecord(v)) {
    const { lat, lng, distance } = v;
    if (typeof lat === 'number' && typeof lng === 'number' && typeof distance === 'number' && distance >= 0) {
      return { lat, lng, distance };
    }
  }
  throw new FilterParseError(`Expected { lat, lng, distance } for ${field}`, { field });
}
