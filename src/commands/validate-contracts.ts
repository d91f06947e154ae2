import { Command } from 'commander'
import { resolve } from 'node:path'
import { validateContracts, type ValidationCheck, type ValidationReport } from '../core/contracts/validator'
import { contractsSummarySchema } from '../schemas/contracts-summary.schema'
import { errorMessage } from '../utils/errors'
import { logger } from '../utils/logger'
import { printValidationSummary } from '../utils/summarize'
import { makeSummaryAnnotator } from '../utils/summary-schema'

interface ValidateContractsCommandOptions {
  readonly path?: string
  readonly bundle?: string
  readonly strict?: boolean
  readonly json?: boolean
}

const annotate = makeSummaryAnnotator(contractsSummarySchema)

function printCheck(check: ValidationCheck): void {
  if (check.level === 'ok') logger.success(check.message)
  else if (check.level === 'warn') logger.warn(check.message)
  else logger.error(check.message)
}

/**
 * Run the contract checks for a repository root and set process.exitCode.
 */
export async function runContractValidation(args: { readonly cwd: string; readonly bundle?: string; readonly strict?: boolean; readonly json?: boolean }): Promise<ValidationReport> {
  logger.info('Validating API contracts...')
  const report = await validateContracts({ rootDir: args.cwd, bundle: args.bundle, strict: args.strict, onCheck: printCheck })
  if (args.json === true) {
    logger.json(annotate({ ok: report.ok, action: 'validate-contracts' as const, checks: report.checks, final: true as const }))
  } else {
    await printValidationSummary(report)
    if (report.ok) logger.success('Contract validation complete!')
  }
  if (!report.ok) process.exitCode = 1
  return report
}

/**
 * Register the `validate-contracts` command.
 */
export function registerValidateContractsCommand(program: Command): void {
  program
    .command('validate-contracts')
    .description('Check the contract bundle and parse its event schemas')
    .option('--path <dir>', 'Repository root (defaults to the current directory)')
    .option('--bundle <dir>', 'Contract bundle directory relative to the root')
    .option('--strict', 'Also compile every event schema as a JSON Schema')
    .option('--json', 'Output a JSON summary only')
    .action(async (opts: ValidateContractsCommandOptions): Promise<void> => {
      try {
        if (opts.json === true) logger.setJsonOnly(true)
        const cwd: string = opts.path !== undefined ? resolve(opts.path) : process.cwd()
        await runContractValidation({ cwd, bundle: opts.bundle, strict: opts.strict, json: opts.json })
      } catch (err) {
        logger.error(errorMessage(err))
        process.exitCode = 1
      }
    })
}
