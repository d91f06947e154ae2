import { PreflightError } from '../utils/errors'
import { logger } from '../utils/logger'
import { proc } from '../utils/process'
import type { CallerIdentity, FunctionService } from './remote/lambda'

export interface PreflightResult {
  /** Installer binary to use, pip3 preferred */
  readonly pip: string
  readonly identity?: CallerIdentity
}

export interface PreflightOptions {
  readonly region: string
  readonly service: FunctionService
  /** Dry runs never reach AWS, so the CLI and credentials are not required */
  readonly skipRemote: boolean
}

async function firstAvailable(cmds: readonly string[]): Promise<string | undefined> {
  for (const c of cmds) {
    if (await proc.has(c)) return c
  }
  return undefined
}

/**
 * Verify tools and credentials before any unit is touched. Throws PreflightError.
 */
export async function checkPrerequisites(opts: PreflightOptions): Promise<PreflightResult> {
  logger.info('Checking prerequisites...')
  if (!opts.skipRemote && !(await proc.has('aws'))) {
    throw new PreflightError('AWS CLI not found.', 'Install it first: https://aws.amazon.com/cli/')
  }
  if (!(await proc.has('python3'))) throw new PreflightError('Python 3 not found.')
  const pip: string | undefined = await firstAvailable(['pip3', 'pip'])
  if (pip === undefined) throw new PreflightError('pip not found.')
  let identity: CallerIdentity | undefined
  if (!opts.skipRemote) {
    identity = await opts.service.checkIdentity(opts.region)
    if (identity.account !== undefined) logger.note(`AWS account: ${identity.account}`)
  }
  logger.success('Prerequisites check passed!')
  return { pip, identity }
}
