/**
 * JSON Schema for the final JSON object emitted by `validate-contracts --json`.
 */
export const contractsSummarySchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['ok', 'action', 'checks', 'final'],
  properties: {
    ok: { type: 'boolean' },
    action: { const: 'validate-contracts' },
    checks: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'level', 'message'],
        properties: {
          name: { type: 'string' },
          level: { enum: ['ok', 'warn', 'error'] },
          message: { type: 'string' }
        }
      }
    },
    final: { const: true }
  }
} as const
