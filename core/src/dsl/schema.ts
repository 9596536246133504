// Entity DSL schema (draft 2020-12). Unknown field keys are allowed so models can
// carry settings other layers read.
export const DSL_SCHEMA_2020_12 = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
  },
  propertyNames: {
    anyOf: [{ const: '$schema' }, { type: 'string', pattern: '^[a-zA-Z_][a-zA-Z0-9_]*$' }],
  },
  additionalProperties: {
    type: 'object',
    properties: {
      table: { type: 'string' },
      fields: {
        type: 'object',
        propertyNames: { type: 'string', pattern: '^[a-zA-Z_][a-zA-Z0-9_]*$' },
        additionalProperties: {
          type: 'object',
          properties: {
            type: { type: 'string' },
            label: { type: 'string' },
            multi: { type: 'boolean' },
            values: {
              anyOf: [
                { type: 'array', items: { type: 'string' }, minItems: 1 },
                { type: 'object', additionalProperties: { type: ['string', 'number'] }, minProperties: 1 },
              ],
            },
            filter: { enum: ['custom', false] },
            columnName: { type: 'string' },
            save: { type: 'boolean' },
            source: { type: 'string' },
            as: { type: 'string' },
          },
          additionalProperties: true,
        },
      },
      filter: {
        type: 'object',
        properties: {
          complexityLimit: { type: 'number', exclusiveMinimum: 0, maximum: 100 },
        },
        additionalProperties: false,
      },
    },
    required: ['fields'],
    additionalProperties: true,
  },
} as const satisfies Record<string, unknown>;

export const DEFAULT_DSL_SCHEMA: Record<string, unknown> = DSL_SCHEMA_2020_12;
