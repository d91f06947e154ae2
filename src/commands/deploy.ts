import { Command } from 'commander'
import { confirm as clackConfirm, isCancel } from '@clack/prompts'
import { resolve } from 'node:path'
import { constants } from '../constants'
import { loadCatalog, selectUnits } from '../core/catalog/catalog'
import { loadDotenv, resolveRegion } from '../core/config/env'
import { runDeployment } from '../core/deploy/pipeline'
import { checkPrerequisites } from '../core/preflight'
import { AwsCliFunctionService, type FunctionService } from '../core/remote/lambda'
import { deploySummarySchema } from '../schemas/deploy-summary.schema'
import type { DeploymentReport } from '../types/deploy-result'
import { errorMessage, PreflightError } from '../utils/errors'
import { logger } from '../utils/logger'
import { printDeploySummary } from '../utils/summarize'
import { makeSummaryAnnotator } from '../utils/summary-schema'

interface DeployOptions {
  readonly path?: string
  readonly region?: string
  readonly config?: string
  readonly dryRun?: boolean
  readonly json?: boolean
  readonly yes?: boolean
  readonly ci?: boolean
}

export interface DeployFunctionsArgs {
  readonly environment: string
  readonly unit?: string
  readonly cwd: string
  readonly region?: string
  readonly config?: string
  readonly dryRun?: boolean
  readonly json?: boolean
  readonly yes?: boolean
  readonly ci?: boolean
  /** Whether prompts can be shown; defaults to stdin being a terminal */
  readonly interactive?: boolean
  readonly service?: FunctionService
}

const annotate = makeSummaryAnnotator(deploySummarySchema)

function isProduction(environment: string): boolean {
  const e = environment.toLowerCase()
  return e === 'prod' || e === 'production'
}

async function confirmProduction(environment: string, count: number): Promise<boolean> {
  const answer = await clackConfirm({ message: `Deploy ${count} function(s) to ${environment}?`, initialValue: false })
  return !isCancel(answer) && answer
}

/**
 * Package and deploy the selected functions. Returns null when the run stopped
 * before any function was touched; sets process.exitCode on failure.
 */
export async function deployFunctions(args: DeployFunctionsArgs): Promise<DeploymentReport | null> {
  const rootDir: string = args.cwd
  const fileEnv = await loadDotenv(rootDir)
  const region: string = resolveRegion(args.region, fileEnv)
  const catalog = await loadCatalog(rootDir, args.config)
  const units = selectUnits(catalog, args.unit)
  const dryRun: boolean = args.dryRun === true
  const service: FunctionService = args.service ?? new AwsCliFunctionService()

  logger.plain('')
  logger.section('LAMBDA FUNCTIONS DEPLOYMENT')
  logger.plain(`Environment: ${args.environment}`)
  logger.plain(`Region: ${region}`)
  logger.plain(`Functions: ${units.length}`)
  if (dryRun) logger.note('Dry run: archives are built but not uploaded')
  logger.plain('')

  const interactive: boolean = (args.interactive ?? Boolean(process.stdin.isTTY)) && args.ci !== true && args.json !== true
  if (isProduction(args.environment) && args.yes !== true && interactive) {
    if (!(await confirmProduction(args.environment, units.length))) {
      logger.warn('Deployment aborted by user')
      process.exitCode = 1
      return null
    }
  }

  let pip: string
  try {
    pip = (await checkPrerequisites({ region, service, skipRemote: dryRun })).pip
  } catch (err) {
    if (!(err instanceof PreflightError)) throw err
    logger.error(err.message)
    if (err.remedy !== undefined) logger.note(err.remedy)
    if (args.json === true) logger.json({ ok: false, action: 'deploy', environment: args.environment, region, message: err.message, final: true })
    process.exitCode = 1
    return null
  }

  const report = await runDeployment(units, { catalog, environment: args.environment, region, pip, service, dryRun })
  if (args.json === true) {
    logger.json(annotate({
      ok: report.failed === 0,
      action: 'deploy' as const,
      environment: report.environment,
      region: report.region,
      dryRun,
      succeeded: report.succeeded,
      failed: report.failed,
      failedUnits: report.failedUnits,
      outcomes: report.outcomes,
      final: true as const
    }))
  } else {
    await printDeploySummary(report)
  }
  if (report.failed > 0) process.exitCode = 1
  return report
}

/**
 * Register the `deploy` command.
 */
export function registerDeployCommand(program: Command): void {
  program
    .command('deploy')
    .description('Package Lambda functions and upload their code')
    .argument('[environment]', 'Environment label', constants.DEFAULT_ENVIRONMENT)
    .argument('[function]', 'Deploy only this function')
    .option('--path <dir>', 'Repository root (defaults to the current directory)')
    .option('--region <region>', 'AWS region (defaults to REGION, AWS_REGION or us-east-1)')
    .option('--config <file>', `Catalog file relative to the root (default ${constants.CONFIG_FILE})`)
    .option('--dry-run', 'Build archives without uploading them')
    .option('--json', 'Output a JSON summary only')
    .option('--yes', 'Skip the production confirmation')
    .option('--ci', 'CI mode (non-interactive)')
    .action(async (environment: string, unit: string | undefined, opts: DeployOptions): Promise<void> => {
      try {
        if (opts.json === true) logger.setJsonOnly(true)
        const cwd: string = opts.path !== undefined ? resolve(opts.path) : process.cwd()
        await deployFunctions({ environment, unit, cwd, region: opts.region, config: opts.config, dryRun: opts.dryRun, json: opts.json, yes: opts.yes, ci: opts.ci })
      } catch (err) {
        logger.error(errorMessage(err))
        process.exitCode = 1
      }
    })
}
