/**
 * JSON Schema for the final JSON object emitted by `deploy --json`.
 */
export const deploySummarySchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['ok', 'action', 'environment', 'region', 'succeeded', 'failed', 'failedUnits', 'outcomes', 'final'],
  properties: {
    ok: { type: 'boolean' },
    action: { const: 'deploy' },
    environment: { type: 'string', minLength: 1 },
    region: { type: 'string', minLength: 1 },
    dryRun: { type: 'boolean' },
    succeeded: { type: 'integer', minimum: 0 },
    failed: { type: 'integer', minimum: 0 },
    failedUnits: { type: 'array', items: { type: 'string' } },
    outcomes: {
      type: 'array',
      items: {
        type: 'object',
        required: ['unit', 'status', 'durationMs'],
        properties: {
          unit: { type: 'string', minLength: 1 },
          status: { enum: ['skipped', 'package-failed', 'deployed', 'deploy-failed'] },
          durationMs: { type: 'integer', minimum: 0 },
          archivePath: { type: 'string' },
          archiveBytes: { type: 'integer', minimum: 0 }
        }
      }
    },
    final: { const: true }
  }
} as const
