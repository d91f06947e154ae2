import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'

/** Files to create, keyed by path relative to the repository root. */
export type RepoLayout = Readonly<Record<string, string>>

export async function makeRepo(layout: RepoLayout): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'lpk-repo-'))
  await writeLayout(dir, layout)
  return dir
}

export async function writeLayout(dir: string, layout: RepoLayout): Promise<void> {
  for (const [rel, content] of Object.entries(layout)) {
    const p = join(dir, ...rel.split('/'))
    await mkdir(dirname(p), { recursive: true })
    await writeFile(p, content, 'utf8')
  }
}

export async function withRepo<T>(layout: RepoLayout, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await makeRepo(layout)
  try { return await fn(dir) } finally { await rm(dir, { recursive: true, force: true }) }
}

/** A minimal function source tree for each name. */
export function functionSources(names: readonly string[]): RepoLayout {
  const out: Record<string, string> = {}
  for (const n of names) out[`lambdas/${n}/handler.py`] = `def handler(event, context):\n    return "${n}"\n`
  return out
}
