export interface PackageManifest {
  name: string
  version: string
  description?: string
  dependencies?: string[]
}

export interface WorkspaceConfig {
  packagePath: string[]
  basePackage: string
  packages: Record<string, string>
}

export interface DiscoveredPackage {
  manifest: PackageManifest
  directory: string
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ValidationError = {
  path: string
  message: string
}
