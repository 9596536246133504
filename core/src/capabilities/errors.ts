export class AdapterSelectionError extends Error {
  readonly code = 'adapter_selection_error';
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AdapterSelectionError';
    this.details = details;
  }
}
