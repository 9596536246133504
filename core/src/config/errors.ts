export class ConfigValidationError extends Error {
  readonly code = 'config_invalid';
  readonly ajvErrors: unknown[];

  constructor(message: string, ajvErrors: unknown[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.ajvErrors = ajvErrors;
  }
}
