import { parse } from 'dotenv'
import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { constants } from '../../constants'
import { fsx } from '../../utils/fs'

/**
 * Read `.env` then `.env.local` from the repository root. Later files win;
 * nothing is written to process.env.
 */
export async function loadDotenv(rootDir: string): Promise<Readonly<Record<string, string>>> {
  const out: Record<string, string> = {}
  for (const name of ['.env', '.env.local']) {
    const path: string = join(rootDir, name)
    if (!(await fsx.isFile(path))) continue
    const parsed: Record<string, string> = parse(await readFile(path, 'utf8'))
    for (const [k, v] of Object.entries(parsed)) {
      const tv: string = v.trim()
      if (tv.length > 0) out[k] = tv
    }
  }
  return out
}

function firstSet(...vals: readonly (string | undefined)[]): string | undefined {
  for (const v of vals) if (typeof v === 'string' && v.trim().length > 0) return v.trim()
  return undefined
}

/**
 * Region precedence: explicit flag, then REGION and AWS_REGION from the real
 * environment, then from dotenv files, then the default.
 */
export function resolveRegion(flag: string | undefined, fileEnv: Readonly<Record<string, string>>, env: NodeJS.ProcessEnv = process.env): string {
  return firstSet(flag, env.REGION, env.AWS_REGION, fileEnv.REGION, fileEnv.AWS_REGION) ?? constants.DEFAULT_REGION
}
