import type { ErrorInfo } from '../utils/errors'

interface OutcomeBase {
  readonly unit: string
  readonly durationMs: number
}

export interface SkippedOutcome extends OutcomeBase {
  readonly status: 'skipped'
  readonly reason: 'missing-source'
  readonly sourceDir: string
}

export interface PackageFailedOutcome extends OutcomeBase {
  readonly status: 'package-failed'
  readonly message: string
}

export interface DeployedOutcome extends OutcomeBase {
  readonly status: 'deployed'
  readonly archivePath: string
  readonly archiveBytes: number
  readonly dryRun: boolean
  readonly version?: string
  readonly codeSha256?: string
}

export interface DeployFailedOutcome extends OutcomeBase {
  readonly status: 'deploy-failed'
  readonly error: ErrorInfo
}

export type UnitOutcome = SkippedOutcome | PackageFailedOutcome | DeployedOutcome | DeployFailedOutcome

export interface DeploymentReport {
  readonly environment: string
  readonly region: string
  readonly outcomes: readonly UnitOutcome[]
  readonly succeeded: number
  readonly failed: number
  readonly failedUnits: readonly string[]
}

export function isFailure(outcome: UnitOutcome): boolean {
  return outcome.status !== 'deployed'
}
