import { readFile, stat } from 'node:fs/promises'
import { isAbsolute, relative, resolve, sep } from 'node:path'

interface FSX {
  readonly exists: (path: string) => Promise<boolean>
  readonly isDir: (path: string) => Promise<boolean>
  readonly isFile: (path: string) => Promise<boolean>
  readonly readJson: (path: string) => Promise<unknown>
}

async function exists(path: string): Promise<boolean> {
  try { const s = await stat(path); return s.isFile() || s.isDirectory() } catch { return false }
}

async function isDir(path: string): Promise<boolean> {
  try { return (await stat(path)).isDirectory() } catch { return false }
}

async function isFile(path: string): Promise<boolean> {
  try { return (await stat(path)).isFile() } catch { return false }
}

/** Returns null when the file is missing; parse errors propagate. */
async function readJson(path: string): Promise<unknown> {
  let buf: string
  try { buf = await readFile(path, 'utf8') } catch { return null }
  return JSON.parse(buf)
}

export const fsx: FSX = { exists, isDir, isFile, readJson }

/** True when `child` resolves to a path strictly below `parent`. */
export function isWithin(parent: string, child: string): boolean {
  const rel: string = relative(resolve(parent), resolve(child))
  return rel.length > 0 && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel)
}
