import type { ErrorObject } from 'ajv';

export type DslLoadDetails = {
  filePath?: string;
  modelsDir?: string;
  defaultModelKey?: string;
  cause?: unknown;
};

export class DslLoadError extends Error {
  readonly code = 'dsl_load_error';
  readonly details: DslLoadDetails;

  constructor(message: string, details: DslLoadDetails = {}) {
    super(message);
    this.name = 'DslLoadError';
    this.details = details;
  }
}

/** `/person/fields must be object; /$schema must match format "uri"` */
function describeAjvErrors(errors: readonly ErrorObject[]): string {
  if (!errors.length) return 'no details';
  return errors.map((e) => `${e.instancePath || '/'} ${e.message ?? e.keyword}`).join('; ');
}

export class DslValidationError extends Error {
  readonly code = 'dsl_schema_invalid';
  readonly ajvErrors: readonly ErrorObject[];

  constructor(ajvErrors: readonly ErrorObject[]) {
    super(`Invalid DSL schema: ${describeAjvErrors(ajvErrors)}`);
    this.name = 'DslValidationError';
    this.ajvErrors = ajvErrors;
  }
}

/** Where in the DSL a field failed to map onto a filterable field. */
export type DslConstraintDetails = {
  modelKey: string;
  field: string;
  type?: string;
  source?: string;
};

export class DslConstraintError extends Error {
  readonly code = 'dsl_constraint_error';
  readonly details: DslConstraintDetails;

  constructor(message: string, details: DslConstraintDetails) {
    super(message);
    this.name = 'DslConstraintError';
    this.details = details;
  }
}
