export const constants = {
  CONFIG_FILE: 'lambda-pack.config.json',
  UNITS_DIR: 'lambdas',
  SHARED_DIR: 'shared',
  MANIFEST_FILE: 'requirements.txt',
  TEMP_DIR: 'temp_packages',
  DEFAULT_ENVIRONMENT: 'dev',
  DEFAULT_REGION: 'us-east-1',
  CONTRACTS_BUNDLE: 'contracts/rfp-contracts',
  OPENAPI_SPEC: 'openapi/api-gateway.yaml',
  WORKFLOW_EVENT_SCHEMA: 'events/workflow-event.schema.json',
  EVENTS_DIR: 'events',
  SCHEMA_SUFFIX: '.schema.json'
} as const

/** Functions deployed when no catalog file is present. */
export const DEFAULT_UNITS: readonly string[] = [
  'sam-gov-daily-download',
  'sam-json-processor',
  'sam-sqs-generate-match-reports',
  'sam-daily-email-notification',
  'sam-email-notification',
  'sam-merge-and-archive-result-logs',
  'sam-produce-user-report',
  'sam-produce-web-reports'
]
