import { mapLambdaError, PreflightError, type ErrorInfo } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { isRecord } from '../../utils/guards'
import { proc, quoteArg } from '../../utils/process'

export interface CallerIdentity {
  readonly account?: string
  readonly arn?: string
}

export interface UpdateCodeArgs {
  readonly functionName: string
  readonly zipPath: string
  readonly region: string
  readonly publish: boolean
}

export type UpdateCodeResult =
  | { readonly ok: true; readonly version?: string; readonly codeSha256?: string }
  | { readonly ok: false; readonly error: ErrorInfo }

/**
 * Remote function service the deployer talks to.
 */
export interface FunctionService {
  checkIdentity(region: string): Promise<CallerIdentity>
  updateFunctionCode(args: UpdateCodeArgs): Promise<UpdateCodeResult>
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const v: unknown = JSON.parse(text)
    return isRecord(v) ? v : null
  } catch { return null }
}

function str(obj: Record<string, unknown> | null, key: string): string | undefined {
  const v = obj?.[key]
  return typeof v === 'string' ? v : undefined
}

/** AWS Lambda through the `aws` CLI. */
export class AwsCliFunctionService implements FunctionService {
  constructor(private readonly bin: string = 'aws') {}

  async checkIdentity(region: string): Promise<CallerIdentity> {
    const cmd = `${this.bin} sts get-caller-identity --region ${quoteArg(region)} --output json`
    logger.debug(`$ ${cmd}`)
    const res = await proc.run({ cmd })
    if (!res.ok) throw new PreflightError("AWS credentials not configured. Run 'aws configure'", 'Configure credentials or set AWS_PROFILE')
    const body = parseJsonObject(res.stdout)
    return { account: str(body, 'Account'), arn: str(body, 'Arn') }
  }

  async updateFunctionCode(args: UpdateCodeArgs): Promise<UpdateCodeResult> {
    const parts: string[] = [
      this.bin, 'lambda', 'update-function-code',
      '--function-name', quoteArg(args.functionName),
      '--zip-file', quoteArg(`fileb://${args.zipPath}`),
      '--region', quoteArg(args.region)
    ]
    if (args.publish) parts.push('--publish')
    parts.push('--output', 'json')
    const cmd: string = parts.join(' ')
    logger.debug(`$ ${cmd}`)
    const res = await proc.run({ cmd })
    if (!res.ok) return { ok: false, error: mapLambdaError(res.stderr || res.stdout) }
    const body = parseJsonObject(res.stdout)
    return { ok: true, version: str(body, 'Version'), codeSha256: str(body, 'CodeSha256') }
  }
}
