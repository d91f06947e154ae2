export interface UnitDescriptor {
  readonly name: string
  /** Source directory, relative to the repository root */
  readonly sourceDir: string
  /** Dependency manifest file name inside sourceDir */
  readonly manifest: string
}

/** Shape of lambda-pack.config.json. Every field is optional. */
export interface LambdaPackConfigFile {
  readonly unitsDir?: string
  readonly sharedDir?: string
  /** Base manifest at the repository root, installed into every unit */
  readonly baseManifest?: string
  readonly tempDir?: string
  readonly units?: readonly (string | { readonly name: string; readonly sourceDir?: string; readonly manifest?: string })[]
}

export interface Catalog {
  readonly rootDir: string
  readonly unitsDir: string
  readonly sharedDir: string
  readonly baseManifest: string
  readonly tempDir: string
  readonly units: readonly UnitDescriptor[]
}
