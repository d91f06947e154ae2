import { cp, mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import type { Catalog, UnitDescriptor } from '../../types/config'
import { fsx, isWithin } from '../../utils/fs'
import { logger } from '../../utils/logger'
import { proc, quoteArg } from '../../utils/process'
import { createArchive } from './archive'
import { mergeRequirements, parseRequirements, type RequirementLine } from './requirements'

export interface UnitPaths {
  readonly sourceDir: string
  readonly packageDir: string
  readonly zipPath: string
  readonly manifestPath: string
}

export interface PackagedUnit {
  readonly zipPath: string
  readonly archiveBytes: number
}

export const PACKAGE_STEPS = 5

export function tempRoot(catalog: Catalog): string {
  return join(catalog.rootDir, catalog.tempDir)
}

/** Working paths for one unit. Throws if any of them would leave the packaging root. */
export function unitPaths(catalog: Catalog, unit: UnitDescriptor): UnitPaths {
  const root: string = tempRoot(catalog)
  const paths: UnitPaths = {
    sourceDir: join(catalog.rootDir, unit.sourceDir),
    packageDir: join(root, unit.name),
    zipPath: join(root, `${unit.name}.zip`),
    manifestPath: join(root, `${unit.name}.requirements.txt`)
  }
  for (const p of [paths.packageDir, paths.zipPath, paths.manifestPath]) {
    if (!isWithin(root, p)) throw new Error(`Refusing to write outside ${catalog.tempDir}: ${p}`)
  }
  return paths
}

async function readManifest(path: string): Promise<readonly RequirementLine[] | null> {
  if (!(await fsx.isFile(path))) return null
  return parseRequirements(await readFile(path, 'utf8'), dirname(path))
}

async function copyContents(from: string, to: string): Promise<void> {
  const entries = await readdir(from, { withFileTypes: true })
  for (const e of entries) {
    // Top-level dot entries stay behind, like a shell glob
    if (e.name.startsWith('.')) continue
    await cp(join(from, e.name), join(to, e.name), { recursive: true })
  }
}

async function installDependencies(catalog: Catalog, unit: UnitDescriptor, paths: UnitPaths, pip: string): Promise<void> {
  const unitReqs = await readManifest(join(paths.sourceDir, unit.manifest))
  if (unitReqs === null) logger.warn(`No ${unit.manifest} found for ${unit.name}`)
  const baseReqs = await readManifest(join(catalog.rootDir, catalog.baseManifest))
  const merged = mergeRequirements(unitReqs ?? [], baseReqs ?? [])
  if (merged.overridden.length > 0) {
    logger.warn(`${unit.name}: unit requirements override base pins for ${merged.overridden.join(', ')}`)
  }
  if (merged.lines.length === 0) return
  await writeFile(paths.manifestPath, merged.lines.join('\n') + '\n', 'utf8')
  const cmd = `${pip} install -r ${quoteArg(paths.manifestPath)} -t ${quoteArg(paths.packageDir)} --quiet`
  logger.debug(`$ ${cmd}`)
  const res = await proc.run({ cmd, cwd: catalog.rootDir })
  if (!res.ok) {
    const detail: string = res.stderr.trim().split(/\r?\n/).slice(-1)[0] ?? ''
    throw new Error(`Dependency install failed (exit ${res.exitCode})${detail.length > 0 ? `: ${detail}` : ''}`)
  }
}

/**
 * Build the function archive for one unit: fresh package directory, unit
 * code, shared libraries, dependencies, zip. Throws on any failure.
 */
export async function packageUnit(catalog: Catalog, unit: UnitDescriptor, pip: string): Promise<PackagedUnit> {
  const paths = unitPaths(catalog, unit)
  await rm(paths.packageDir, { recursive: true, force: true })
  await rm(paths.zipPath, { force: true })
  await rm(paths.manifestPath, { force: true })
  await mkdir(paths.packageDir, { recursive: true })

  logger.step(1, PACKAGE_STEPS, 'Copying function code...')
  await copyContents(paths.sourceDir, paths.packageDir)

  logger.step(2, PACKAGE_STEPS, 'Copying shared libraries...')
  const sharedDir: string = join(catalog.rootDir, catalog.sharedDir)
  if (await fsx.isDir(sharedDir)) {
    await cp(sharedDir, join(paths.packageDir, basename(sharedDir)), { recursive: true })
  } else {
    logger.warn(`Shared directory not found: ${catalog.sharedDir}`)
  }

  logger.step(3, PACKAGE_STEPS, 'Installing dependencies...')
  await installDependencies(catalog, unit, paths, pip)

  logger.step(4, PACKAGE_STEPS, 'Creating deployment package...')
  const archiveBytes: number = await createArchive(paths.packageDir, paths.zipPath)
  return { zipPath: paths.zipPath, archiveBytes }
}
