import Ajv, { type AnySchema } from 'ajv'
import Ajv2019 from 'ajv/dist/2019'
import Ajv2020 from 'ajv/dist/2020'
import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { constants } from '../../constants'
import { errorMessage } from '../../utils/errors'
import { fsx } from '../../utils/fs'
import { isRecord } from '../../utils/guards'

export type CheckLevel = 'ok' | 'warn' | 'error'

export interface ValidationCheck {
  readonly name: string
  readonly level: CheckLevel
  readonly message: string
}

export interface ValidationReport {
  readonly ok: boolean
  readonly checks: readonly ValidationCheck[]
}

export interface ValidateContractsOptions {
  readonly rootDir: string
  /** Bundle directory relative to rootDir */
  readonly bundle?: string
  /** Also compile each schema document */
  readonly strict?: boolean
  /** Called as soon as each check completes */
  readonly onCheck?: (check: ValidationCheck) => void
}

function isSchemaDocument(val: unknown): val is AnySchema {
  return isRecord(val) || typeof val === 'boolean'
}

export type SchemaDraft = 'draft-07' | '2019-09' | '2020-12'

/**
 * The JSON Schema draft a document declares through `$schema`, draft-07 when it
 * declares none, or undefined when the draft is not one Ajv compiles.
 */
export function schemaDraft(schema: unknown): SchemaDraft | undefined {
  const declared: unknown = isRecord(schema) ? schema.$schema : undefined
  if (declared === undefined) return 'draft-07'
  if (typeof declared !== 'string') return undefined
  if (declared.includes('draft-07')) return 'draft-07'
  if (declared.includes('2019-09')) return '2019-09'
  if (declared.includes('2020-12')) return '2020-12'
  return undefined
}

/**
 * Compiles schema documents with one Ajv instance per draft.
 */
class SchemaCompiler {
  private readonly instances = new Map<SchemaDraft, Ajv | Ajv2019 | Ajv2020>()

  private instanceFor(draft: SchemaDraft): Ajv | Ajv2019 | Ajv2020 {
    const existing = this.instances.get(draft)
    if (existing !== undefined) return existing
    const opts = { allErrors: true, strict: false, logger: false } as const
    const created = draft === '2020-12' ? new Ajv2020(opts) : draft === '2019-09' ? new Ajv2019(opts) : new Ajv(opts)
    this.instances.set(draft, created)
    return created
  }

  add(key: string, draft: SchemaDraft, schema: unknown): void {
    if (!isSchemaDocument(schema)) throw new Error('schema must be an object or a boolean')
    this.instanceFor(draft).addSchema(schema, key)
  }

  compile(key: string, draft: SchemaDraft): void {
    const fn = this.instanceFor(draft).getSchema(key)
    if (fn === undefined) throw new Error(`schema ${key} was not registered`)
  }
}

/**
 * Check the contract bundle: presence of the bundle and its OpenAPI spec,
 * then JSON well-formedness of every event schema. Stops at the first error.
 */
export async function validateContracts(opts: ValidateContractsOptions): Promise<ValidationReport> {
  const checks: ValidationCheck[] = []
  const push = (name: string, level: CheckLevel, message: string): void => {
    const c: ValidationCheck = { name, level, message }
    checks.push(c)
    opts.onCheck?.(c)
  }
  const finish = (): ValidationReport => ({ ok: !checks.some((c) => c.level === 'error'), checks })

  const bundleRel: string = opts.bundle ?? constants.CONTRACTS_BUNDLE
  const bundleDir: string = join(opts.rootDir, bundleRel)
  if (!(await fsx.isDir(bundleDir))) {
    push('bundle', 'error', 'Contracts not found. Run: git submodule update --init --recursive')
    return finish()
  }
  push('bundle', 'ok', 'Contracts submodule present')

  if (!(await fsx.isFile(join(bundleDir, constants.OPENAPI_SPEC)))) {
    push('openapi', 'error', `OpenAPI spec not found: ${bundleRel}/${constants.OPENAPI_SPEC}`)
    return finish()
  }
  push('openapi', 'ok', 'OpenAPI spec found')

  if (await fsx.isFile(join(bundleDir, constants.WORKFLOW_EVENT_SCHEMA))) push('event-schemas', 'ok', 'Event schemas found')
  else push('event-schemas', 'warn', 'Event schemas not found')

  const eventsDir: string = join(bundleDir, constants.EVENTS_DIR)
  if (!(await fsx.isDir(eventsDir))) {
    push('schema-dir', 'warn', 'No event schemas directory found')
    return finish()
  }
  const files: string[] = (await readdir(eventsDir)).filter((f) => f.endsWith(constants.SCHEMA_SUFFIX)).sort()
  const parsed: { readonly file: string; readonly schema: unknown }[] = []
  for (const file of files) {
    let schema: unknown
    try {
      schema = JSON.parse(await readFile(join(eventsDir, file), 'utf8'))
    } catch (err) {
      push(file, 'error', `${file} has invalid JSON: ${errorMessage(err)}`)
      return finish()
    }
    push(file, 'ok', `${file} is valid JSON`)
    parsed.push({ file, schema })
  }

  if (opts.strict === true) {
    const compiler = new SchemaCompiler()
    const drafts: { readonly file: string; readonly draft: SchemaDraft }[] = []
    for (const { file, schema } of parsed) {
      const draft = schemaDraft(schema)
      if (draft === undefined) {
        const declared: unknown = isRecord(schema) ? schema.$schema : undefined
        push(`${file}#schema`, 'error', `${file} declares an unsupported JSON Schema draft: ${String(declared)}`)
        return finish()
      }
      try {
        compiler.add(file, draft, schema)
      } catch (err) {
        push(`${file}#schema`, 'error', `${file} is not a valid JSON Schema: ${errorMessage(err)}`)
        return finish()
      }
      drafts.push({ file, draft })
    }
    for (const { file, draft } of drafts) {
      try {
        compiler.compile(file, draft)
      } catch (err) {
        push(`${file}#schema`, 'error', `${file} is not a valid JSON Schema: ${errorMessage(err)}`)
        return finish()
      }
      push(`${file}#schema`, 'ok', `${file} compiles as a JSON Schema`)
    }
  }
  return finish()
}
