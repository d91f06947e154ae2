import Ajv2020 from 'ajv/dist/2020'
import type { SchemaObject } from 'ajv'

export type Annotated<T> = T & { readonly schemaOk: boolean; readonly schemaErrors: readonly string[] }

/**
 * Build a function that checks final JSON summaries against their schema and
 * attaches the result. LPK_SCHEMA_STRICT=1 turns a mismatch into exit code 1.
 */
export function makeSummaryAnnotator(schema: SchemaObject): <T extends object>(obj: T) => Annotated<T> {
  const ajv = new Ajv2020({ allErrors: true, strict: false })
  const validate = ajv.compile(schema)
  return <T extends object>(obj: T): Annotated<T> => {
    const ok: boolean = validate(obj)
    const errs: string[] = Array.isArray(validate.errors) ? validate.errors.map((e) => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()) : []
    if (process.env.LPK_SCHEMA_STRICT === '1' && errs.length > 0) process.exitCode = 1
    return { ...obj, schemaOk: ok, schemaErrors: errs }
  }
}
