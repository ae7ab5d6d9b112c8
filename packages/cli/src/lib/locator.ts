import { isAbsolute, join, resolve } from 'node:path'
import type { DiscoveredPackage, WorkspaceConfig, Result, ValidationError } from '@msgdef/shared'
import { discoverPackages } from './loader.js'

export interface PackageLocator {
  /** Root directory of `packageName`, or undefined when it is unknown */
  locate(packageName: string): string | undefined
}

export class StaticPackageLocator implements PackageLocator {
  private readonly roots: Map<string, string>

  constructor(roots: Record<string, string> | Map<string, string>) {
    this.roots = roots instanceof Map ? new Map(roots) : new Map(Object.entries(roots))
  }

  static fromPackages(packages: DiscoveredPackage[]): StaticPackageLocator {
    const roots = new Map<string, string>()
    for (const pkg of packages) {
      if (!roots.has(pkg.manifest.name)) roots.set(pkg.manifest.name, pkg.directory)
    }
    return new StaticPackageLocator(roots)
  }

  locate(packageName: string): string | undefined {
    return this.roots.get(packageName)
  }

  packageNames(): string[] {
    return Array.from(this.roots.keys()).sort()
  }
}

function resolveFrom(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : join(projectRoot, path)
}

/**
 * Build the locator for a workspace: explicit `packages` entries take
 * precedence over whatever the search path turns up.
 */
export async function createPackageLocator(
  config: WorkspaceConfig,
  projectRoot: string
): Promise<Result<StaticPackageLocator, ValidationError[]>> {
  const searchPaths = config.packagePath.map(p => resolveFrom(projectRoot, p))
  const discovered = await discoverPackages(searchPaths)
  if (!discovered.ok) return discovered

  const roots = new Map<string, string>()
  for (const [name, path] of Object.entries(config.packages)) {
    roots.set(name, resolve(resolveFrom(projectRoot, path)))
  }
  for (const pkg of discovered.value) {
    if (!roots.has(pkg.manifest.name)) roots.set(pkg.manifest.name, pkg.directory)
  }

  return { ok: true, value: new StaticPackageLocator(roots) }
}
