import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import type { Catalog, UnitDescriptor } from '../../types/config'
import type { DeploymentReport, UnitOutcome } from '../../types/deploy-result'
import { isFailure } from '../../types/deploy-result'
import { errorMessage } from '../../utils/errors'
import { fsx, isWithin } from '../../utils/fs'
import { logger } from '../../utils/logger'
import { packageUnit, PACKAGE_STEPS, tempRoot } from '../packaging/packager'
import type { FunctionService } from '../remote/lambda'

export interface DeployContext {
  readonly catalog: Catalog
  readonly environment: string
  readonly region: string
  readonly pip: string
  readonly service: FunctionService
  readonly dryRun: boolean
}

export function emptyReport(environment: string, region: string): DeploymentReport {
  return { environment, region, outcomes: [], succeeded: 0, failed: 0, failedUnits: [] }
}

/** Fold one unit outcome into the run report. */
export function recordOutcome(report: DeploymentReport, outcome: UnitOutcome): DeploymentReport {
  const failed: boolean = isFailure(outcome)
  return {
    ...report,
    outcomes: [...report.outcomes, outcome],
    succeeded: report.succeeded + (failed ? 0 : 1),
    failed: report.failed + (failed ? 1 : 0),
    failedUnits: failed ? [...report.failedUnits, outcome.unit] : report.failedUnits
  }
}

/**
 * Package and deploy one unit. Never throws: every failure becomes an outcome.
 */
export async function deployUnit(unit: UnitDescriptor, ctx: DeployContext): Promise<UnitOutcome> {
  const t0: number = Date.now()
  const elapsed = (): number => Date.now() - t0
  const sourceDir: string = join(ctx.catalog.rootDir, unit.sourceDir)
  if (!(await fsx.isDir(sourceDir))) {
    logger.error(`Source directory not found: ${unit.sourceDir}`)
    return { unit: unit.name, status: 'skipped', reason: 'missing-source', sourceDir: unit.sourceDir, durationMs: elapsed() }
  }
  let zipPath: string
  let archiveBytes: number
  try {
    const packaged = await packageUnit(ctx.catalog, unit, ctx.pip)
    zipPath = packaged.zipPath
    archiveBytes = packaged.archiveBytes
  } catch (err) {
    const message: string = errorMessage(err)
    logger.error(`❌ Failed to package: ${unit.name} (${message})`)
    return { unit: unit.name, status: 'package-failed', message, durationMs: elapsed() }
  }
  if (ctx.dryRun) {
    logger.step(PACKAGE_STEPS, PACKAGE_STEPS, `Dry run: skipping upload of ${archiveBytes} bytes`)
    return { unit: unit.name, status: 'deployed', archivePath: zipPath, archiveBytes, dryRun: true, durationMs: elapsed() }
  }
  logger.step(PACKAGE_STEPS, PACKAGE_STEPS, 'Deploying to AWS Lambda...')
  const res = await ctx.service.updateFunctionCode({ functionName: unit.name, zipPath, region: ctx.region, publish: true })
  if (!res.ok) {
    logger.error(`❌ Failed to deploy: ${unit.name} (${res.error.message})`)
    if (res.error.remedy !== undefined) logger.warn(`   ${res.error.remedy}`)
    return { unit: unit.name, status: 'deploy-failed', error: res.error, durationMs: elapsed() }
  }
  logger.success(`✅ Deployed: ${unit.name}${res.version !== undefined ? ` (version ${res.version})` : ''}`)
  return { unit: unit.name, status: 'deployed', archivePath: zipPath, archiveBytes, dryRun: false, version: res.version, codeSha256: res.codeSha256, durationMs: elapsed() }
}

/**
 * Deploy units one after another and always remove the packaging root afterwards.
 */
export async function runDeployment(units: readonly UnitDescriptor[], ctx: DeployContext): Promise<DeploymentReport> {
  let report: DeploymentReport = emptyReport(ctx.environment, ctx.region)
  const root: string = tempRoot(ctx.catalog)
  if (!isWithin(ctx.catalog.rootDir, root)) throw new Error(`Packaging root must be inside ${ctx.catalog.rootDir}: ${root}`)
  try {
    for (const unit of units) {
      logger.info(`Processing: ${unit.name}`)
      let outcome: UnitOutcome
      try {
        outcome = await deployUnit(unit, ctx)
      } catch (err) {
        // deployUnit maps known failures; anything else still stays with this unit
        outcome = { unit: unit.name, status: 'package-failed', message: errorMessage(err), durationMs: 0 }
      }
      report = recordOutcome(report, outcome)
      logger.plain('')
    }
  } finally {
    logger.info('Cleaning up temporary files...')
    await rm(root, { recursive: true, force: true })
  }
  return report
}
