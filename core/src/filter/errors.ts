import type { Operator } from './operators.js';

export class FilterParseError extends Error {
  readonly code = 'filter_structural_error';
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FilterParseError';
    this.details = details;
  }
}

export class FilterAuthorizationError extends Error {
  readonly code = 'filter_unauthorized_field';
  readonly fields: readonly string[];
  readonly action: 'filter' | 'sort';

  constructor(fields: readonly string[], action: 'filter' | 'sort' = 'filter') {
    super(`Not authorized to ${action} on: ${fields.join(', ')}`);
    this.name = 'FilterAuthorizationError';
    this.fields = fields;
    this.action = action;
  }
}

export type CapabilityErrorDetails = {
  field: string;
  operator?: Operator;
  adapter: string;
  feature?: string;
  limit?: number;
};

export class FilterCapabilityError extends Error {
  readonly code = 'filter_unsupported_operator';
  readonly details: CapabilityErrorDetails;

  constructor(message: string, details: CapabilityErrorDetails) {
    super(message);
    this.name = 'FilterCapabilityError';
    this.details = details;
  }
}

export type CompileError = FilterParseError | FilterAuthorizationError | FilterCapabilityError;
