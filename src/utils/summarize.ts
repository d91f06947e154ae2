import { appendFile } from 'node:fs/promises'
import type { DeploymentReport } from '../types/deploy-result'
import type { ValidationReport } from '../core/contracts/validator'
import { colors } from './colors'
import { errorMessage } from './errors'
import { logger } from './logger'

function fmtMs(ms: number): string {
  const s = Math.round(ms / 1000)
  const m = Math.floor(s / 60)
  const r = s % 60
  return `${m}m ${r}s`
}

async function appendStepSummary(md: string): Promise<void> {
  const gh: string | undefined = process.env.GITHUB_STEP_SUMMARY
  if (!gh) return
  try {
    await appendFile(gh, md + '\n', 'utf8')
  } catch (err) {
    logger.warn(`Could not write GitHub step summary: ${errorMessage(err)}`)
  }
}

export function deploySummaryLines(report: DeploymentReport): string[] {
  const lines: string[] = []
  lines.push(`${logger.icon('✅', '[ok]')} Successful: ${report.succeeded}`)
  lines.push(`${logger.icon('❌', '[x]')} Failed: ${report.failed}`)
  if (report.failed > 0) {
    lines.push('')
    lines.push('Failed functions:')
    for (const name of report.failedUnits) lines.push(`  - ${name}`)
  }
  return lines
}

export async function printDeploySummary(report: DeploymentReport): Promise<void> {
  logger.plain('')
  logger.section('DEPLOYMENT SUMMARY')
  logger.plain('')
  for (const ln of deploySummaryLines(report)) logger.plain(ln)
  logger.plain('')
  if (report.failed > 0) {
    logger.warn('Some functions failed to deploy. Check that they exist in AWS Lambda.')
  } else {
    logger.success(`${logger.icon('🎉 ', '')}All Lambda functions deployed successfully!`)
  }
  const totalMs: number = report.outcomes.reduce((n, o) => n + o.durationMs, 0)
  const md: string[] = [
    '## Lambda Deploy Summary',
    '',
    `- Environment: ${report.environment}`,
    `- Region: ${report.region}`,
    `- Successful: ${report.succeeded}`,
    `- Failed: ${report.failed}`,
    `- Duration: ${fmtMs(totalMs)}`,
    ''
  ]
  if (report.failed > 0) {
    md.push('| Function | Status | Detail |')
    md.push('|---|---|---|')
    for (const o of report.outcomes) {
      if (o.status === 'skipped') md.push(`| ${o.unit} | skipped | source directory not found |`)
      else if (o.status === 'package-failed') md.push(`| ${o.unit} | package-failed | ${o.message} |`)
      else if (o.status === 'deploy-failed') md.push(`| ${o.unit} | deploy-failed | ${o.error.code} |`)
    }
    md.push('')
  }
  await appendStepSummary(md.join('\n'))
}

export async function printValidationSummary(report: ValidationReport): Promise<void> {
  const passed: number = report.checks.filter((c) => c.level === 'ok').length
  const warned: number = report.checks.filter((c) => c.level === 'warn').length
  const failed: number = report.checks.filter((c) => c.level === 'error').length
  const lines: string[] = [
    colors.bold('Summary'),
    `  • Passed:   ${passed}`,
    `  • Warnings: ${warned}`,
    `  • Errors:   ${failed}`
  ]
  logger.plain('\n' + lines.join('\n'))
  await appendStepSummary([
    '## Contract Validation Summary',
    '',
    `- Passed: ${passed}`,
    `- Warnings: ${warned}`,
    `- Errors: ${failed}`,
    `- Status: ${report.ok ? 'OK' : 'FAILED'}`,
    ''
  ].join('\n'))
}
