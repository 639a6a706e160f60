export const workingSheetsSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'https://working-sheet-index/schemas/working-sheets.json',
  type: 'object',
  required: ['filename', 'path', 'working_sheets'],
  additionalProperties: false,
  properties: {
    filename: { type: 'string' },
    path: { type: 'string' },
    working_sheets: {
      type: 'object',
      propertyNames: { type: 'string', pattern: '^\\d+$' },
      additionalProperties: { $ref: '#/$defs/sheetNames' },
    },
  },
  $defs: {
    sheetNames: {
      type: 'object',
      propertyNames: { type: 'string', minLength: 1 },
      additionalProperties: {
        type: 'array',
        items: { type: 'integer', minimum: 1 },
        uniqueItems: true,
      },
    },
  },
} as const
