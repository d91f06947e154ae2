import { isAbsolute, resolve } from 'node:path'

export interface RequirementLine {
  readonly raw: string
  /** Normalized project name; undefined for option lines such as -r or --index-url */
  readonly name?: string
}

export interface MergedManifest {
  readonly lines: readonly string[]
  /** Base requirements dropped because the unit pins the same project */
  readonly overridden: readonly string[]
}

/** Lowercase and collapse runs of -, _ and . so "Foo_Bar" and "foo-bar" compare equal. */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-')
}

/** Options whose operand may be a file or directory relative to the manifest. */
const PATH_OPTIONS: ReadonlySet<string> = new Set(['-r', '--requirement', '-c', '--constraint', '-e', '--editable'])

function rebasePath(operand: string, baseDir: string): string {
  // URLs and VCS references (git+https:, file:) are left alone
  if (isAbsolute(operand) || /^[A-Za-z][A-Za-z0-9+.-]*:/.test(operand)) return operand
  return resolve(baseDir, operand)
}

function rebaseOption(line: string, baseDir: string): string {
  const m = /^(--?[A-Za-z-]+)(=|\s+)(\S+)$/.exec(line)
  if (m === null) return line
  const [, opt = '', glue = ' ', operand = ''] = m
  return PATH_OPTIONS.has(opt) ? `${opt}${glue}${rebasePath(operand, baseDir)}` : line
}

/**
 * Parse a requirements file. With `baseDir`, relative paths in `-r`, `-c`,
 * `-e` and local archive lines are made absolute against it, so the lines
 * still resolve once merged into a file elsewhere.
 */
export function parseRequirements(content: string, baseDir?: string): readonly RequirementLine[] {
  const out: RequirementLine[] = []
  for (const rawLine of content.split(/\r?\n/)) {
    const hash = rawLine.search(/(^|\s)#/)
    const line = (hash === -1 ? rawLine : rawLine.slice(0, hash)).trim()
    if (line.length === 0) continue
    if (line.startsWith('-')) { out.push({ raw: baseDir === undefined ? line : rebaseOption(line, baseDir) }); continue }
    if (/^\.\.?[\\/]/.test(line)) { out.push({ raw: baseDir === undefined ? line : rebasePath(line, baseDir) }); continue }
    const m = /^([A-Za-z0-9][A-Za-z0-9._-]*)/.exec(line)
    out.push(m === null ? { raw: line } : { raw: line, name: normalizeName(m[1] ?? '') })
  }
  return out
}

/**
 * Merge the unit manifest with the base manifest. The unit wins when both
 * name the same project; option lines from both are kept, unit first.
 */
export function mergeRequirements(unit: readonly RequirementLine[], base: readonly RequirementLine[]): MergedManifest {
  const unitNames = new Set<string>()
  for (const r of unit) if (r.name !== undefined) unitNames.add(r.name)
  const lines: string[] = unit.map((r) => r.raw)
  const overridden: string[] = []
  const seen = new Set<string>(lines)
  for (const r of base) {
    if (r.name !== undefined && unitNames.has(r.name)) { overridden.push(r.name); continue }
    if (seen.has(r.raw)) continue
    seen.add(r.raw)
    lines.push(r.raw)
  }
  return { lines, overridden }
}
