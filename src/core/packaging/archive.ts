import AdmZip from 'adm-zip'
import { readdir, readFile, realpath, stat, writeFile } from 'node:fs/promises'
import { join, posix } from 'node:path'
import { errorMessage } from '../../utils/errors'
import { logger } from '../../utils/logger'

/** Fixed entry timestamp so unchanged inputs yield identical archives. */
const ARCHIVE_EPOCH: Date = new Date(1980, 0, 1, 0, 0, 0)

/**
 * Transient artifacts never shipped in a function archive.
 * Paths are archive-relative with forward slashes.
 */
export function isExcluded(relPath: string): boolean {
  const base: string = posix.basename(relPath)
  if (base.endsWith('.pyc')) return true
  if (base === '.DS_Store') return true
  if (relPath.includes('__pycache__')) return true
  if (relPath.includes('.git')) return true
  return false
}

interface ArchiveFile {
  readonly rel: string
  readonly abs: string
  /** Permission bits of the file (or of a symlink's target) */
  readonly mode: number
}

/**
 * Walk `dir`, following symlinks to files and directories. A directory already
 * on the current path is not entered again.
 */
async function listFiles(dir: string, prefix = '', ancestors: ReadonlySet<string> = new Set()): Promise<ArchiveFile[]> {
  const real: string = await realpath(dir)
  if (ancestors.has(real)) return []
  const visiting = new Set(ancestors).add(real)
  const entries = await readdir(dir, { withFileTypes: true })
  const out: ArchiveFile[] = []
  for (const e of entries) {
    const rel: string = prefix.length > 0 ? `${prefix}/${e.name}` : e.name
    const abs: string = join(dir, e.name)
    if (e.isDirectory()) {
      out.push(...await listFiles(abs, rel, visiting))
    } else if (e.isFile()) {
      out.push({ rel, abs, mode: (await stat(abs)).mode & 0o777 })
    } else if (e.isSymbolicLink()) {
      const target = await stat(abs).catch((err: unknown) => {
        logger.warn(`Skipping broken symlink ${rel}: ${errorMessage(err)}`)
        return null
      })
      if (target === null) continue
      if (target.isDirectory()) out.push(...await listFiles(abs, rel, visiting))
      else if (target.isFile()) out.push({ rel, abs, mode: target.mode & 0o777 })
    }
  }
  return out
}

/**
 * Zip the contents of `sourceDir` into `zipPath` and return the archive size.
 */
export async function createArchive(sourceDir: string, zipPath: string): Promise<number> {
  const files: ArchiveFile[] = (await listFiles(sourceDir))
    .filter((f) => !isExcluded(f.rel))
    .sort((a, b) => (a.rel < b.rel ? -1 : a.rel > b.rel ? 1 : 0))
  const zip = new AdmZip()
  for (const f of files) {
    // adm-zip places the permission bits in the upper half of the external attributes
    zip.addFile(f.rel, await readFile(f.abs), '', f.mode)
    const entry = zip.getEntry(f.rel)
    if (entry !== null) entry.header.time = ARCHIVE_EPOCH
  }
  const buf: Buffer = zip.toBuffer()
  await writeFile(zipPath, buf)
  return buf.length
}

/** Archive-relative file names, mainly for tests and dry-run listings. */
export function archiveEntries(zipPath: string): readonly string[] {
  return new AdmZip(zipPath).getEntries().map((e) => e.entryName).sort()
}
