export class UnknownEntityError extends Error {
  readonly code = 'unknown_entity';
  readonly details: { entity: string };

  constructor(entity: string) {
    super(`Unknown entity: ${entity}`);
    this.name = 'UnknownEntityError';
    this.details = { entity };
  }
}
