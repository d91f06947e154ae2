import { join, resolve } from 'node:path'
import { constants, DEFAULT_UNITS } from '../../constants'
import type { Catalog, LambdaPackConfigFile, UnitDescriptor } from '../../types/config'
import { fsx, isWithin } from '../../utils/fs'
import { isRecord } from '../../utils/guards'

function optionalString(obj: Record<string, unknown>, key: string, prefix: string): string | undefined {
  const v = obj[key]
  if (v === undefined) return undefined
  if (typeof v !== 'string' || v.trim().length === 0) throw new Error(`${prefix}.${key} must be a non-empty string`)
  return v
}

/** Lambda function names: letters, digits, hyphens and underscores, up to 64 characters. */
const UNIT_NAME = /^[A-Za-z0-9_-]{1,64}$/

export function isValidUnitName(name: string): boolean {
  return UNIT_NAME.test(name)
}

function descriptorFor(name: string, unitsDir: string, sourceDir?: string, manifest?: string): UnitDescriptor {
  return { name, sourceDir: sourceDir ?? join(unitsDir, name), manifest: manifest ?? constants.MANIFEST_FILE }
}

/**
 * Validate the parsed contents of lambda-pack.config.json.
 */
export function parseConfigFile(data: unknown, path: string): LambdaPackConfigFile {
  if (!isRecord(data)) throw new Error(`Config must be a JSON object: ${path}`)
  const out: { -readonly [K in keyof LambdaPackConfigFile]: LambdaPackConfigFile[K] } = {
    unitsDir: optionalString(data, 'unitsDir', 'config'),
    sharedDir: optionalString(data, 'sharedDir', 'config'),
    baseManifest: optionalString(data, 'baseManifest', 'config'),
    tempDir: optionalString(data, 'tempDir', 'config')
  }
  const units = data.units
  if (units !== undefined) {
    if (!Array.isArray(units)) throw new Error('config.units must be an array')
    const seen = new Set<string>()
    out.units = units.map((u: unknown, i: number) => {
      const prefix = `units[${i}]`
      let name: string
      let entry: string | { readonly name: string; readonly sourceDir?: string; readonly manifest?: string }
      if (typeof u === 'string') {
        if (u.trim().length === 0) throw new Error(`${prefix} must be a non-empty string`)
        if (!isValidUnitName(u)) throw new Error(`${prefix}: invalid function name "${u}"`)
        name = u
        entry = u
      } else if (isRecord(u)) {
        const n = optionalString(u, 'name', prefix)
        if (n === undefined) throw new Error(`${prefix}.name is required`)
        if (!isValidUnitName(n)) throw new Error(`${prefix}: invalid function name "${n}"`)
        name = n
        entry = { name: n, sourceDir: optionalString(u, 'sourceDir', prefix), manifest: optionalString(u, 'manifest', prefix) }
      } else {
        throw new Error(`${prefix} must be a string or an object with a name`)
      }
      if (seen.has(name)) throw new Error(`${prefix}: duplicate unit name "${name}"`)
      seen.add(name)
      return entry
    })
  }
  return out
}

/**
 * Load the unit catalog for a repository. Falls back to the built-in function
 * list and default layout when no config file exists.
 */
export async function loadCatalog(rootDir: string, file?: string): Promise<Catalog> {
  const path: string = join(rootDir, file ?? constants.CONFIG_FILE)
  let raw: unknown
  try {
    raw = await fsx.readJson(path)
  } catch (err) {
    throw new Error(`Config is not valid JSON: ${path} (${err instanceof Error ? err.message : String(err)})`)
  }
  const cfg: LambdaPackConfigFile = raw === null ? {} : parseConfigFile(raw, path)
  const unitsDir: string = cfg.unitsDir ?? constants.UNITS_DIR
  const entries = cfg.units ?? DEFAULT_UNITS
  const units: UnitDescriptor[] = entries.map((e) => typeof e === 'string'
    ? descriptorFor(e, unitsDir)
    : descriptorFor(e.name, unitsDir, e.sourceDir, e.manifest))
  const catalog: Catalog = {
    rootDir,
    unitsDir,
    sharedDir: cfg.sharedDir ?? constants.SHARED_DIR,
    baseManifest: cfg.baseManifest ?? constants.MANIFEST_FILE,
    tempDir: cfg.tempDir ?? constants.TEMP_DIR,
    units
  }
  checkTempDir(catalog)
  return catalog
}

/**
 * The packaging root is deleted after every run, so it must sit below the
 * repository root and must not overlap any source tree.
 */
export function checkTempDir(catalog: Catalog): void {
  const temp: string = resolve(catalog.rootDir, catalog.tempDir)
  if (!isWithin(catalog.rootDir, temp)) {
    throw new Error(`config.tempDir must be a directory inside the repository root: ${catalog.tempDir}`)
  }
  const protectedDirs: readonly string[] = [catalog.unitsDir, catalog.sharedDir, ...catalog.units.map((u) => u.sourceDir)]
  for (const dir of protectedDirs) {
    const p: string = resolve(catalog.rootDir, dir)
    if (p === temp || isWithin(temp, p) || isWithin(p, temp)) {
      throw new Error(`config.tempDir must not overlap ${dir}: ${catalog.tempDir}`)
    }
  }
}

/**
 * Restrict the catalog to a single unit when a name is given. A name the
 * catalog does not know still gets a descriptor under the units directory.
 */
export function selectUnits(catalog: Catalog, only?: string): readonly UnitDescriptor[] {
  if (only === undefined || only.length === 0) return catalog.units
  if (!isValidUnitName(only)) throw new Error(`Invalid function name: "${only}"`)
  const known: UnitDescriptor | undefined = catalog.units.find((u) => u.name === only)
  return [known ?? descriptorFor(only, catalog.unitsDir)]
}
