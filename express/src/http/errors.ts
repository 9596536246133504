import {
  FilterAuthorizationError,
  FilterCapabilityError,
  FilterParseError,
  QueryTooComplexError,
  RequestParseError,
  UnknownEntityError,
} from '@querygate/core';

import type { FailPayload } from '../middleware/responseEnvelope.js';

function hasStatus(e: unknown): e is { status: number; message: string } {
  return e instanceof Error && typeof Reflect.get(e, 'status') === 'number';
}

/** Maps query errors onto the response envelope's failure shape. */
export function toHttpFailure(e: unknown): FailPayload {
  if (e instanceof FilterParseError) {
    return { code: 400, message: e.message, errors: { root: 'Bad request', ...(e.details ?? {}) } };
  }
  if (e instanceof RequestParseError) {
    return { code: 400, message: e.message, errors: { root: 'Bad request', ...e.toPayload() } };
  }
  if (e instanceof FilterAuthorizationError) {
    return { code: 403, message: e.message, errors: { root: 'Forbidden', fields: [...e.fields] } };
  }
  if (e instanceof UnknownEntityError) {
    return { code: 404, message: e.message, errors: { root: 'Not found' } };
  }
  if (e instanceof FilterCapabilityError) {
    return { code: 422, message: e.message, errors: { root: 'Unsupported', ...e.details } };
  }
  if (e instanceof QueryTooComplexError) {
    return { code: 422, message: e.message, errors: { root: 'Too complex', ...e.toPayload() } };
  }
  // body-parser failures carry their own 4xx status
  if (hasStatus(e) && e.status >= 400 && e.status < 500) {
    return { code: e.status, message: e.message, errors: { root: 'Bad request' } };
  }
  return { code: 500, message: 'Internal error', errors: { root: 'Error' } };
}
