import { readFile, access, readdir, lstat } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import Ajv from 'ajv'
import { parse as parseYaml } from 'yaml'
import { packageManifestSchema } from '@msgdef/shared'
import type { PackageManifest, DiscoveredPackage, Result, ValidationError } from '@msgdef/shared'

export const MANIFEST_FILE = 'package.yaml'

const ajv = new Ajv({ allErrors: true })
const validateManifest = ajv.compile<PackageManifest>(packageManifestSchema)

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export async function loadPackageManifest(directory: string): Promise<Result<DiscoveredPackage, ValidationError[]>> {
  const manifestPath = join(directory, MANIFEST_FILE)

  if (!(await fileExists(manifestPath))) {
    return { ok: false, error: [{ path: manifestPath, message: `${MANIFEST_FILE} not found` }] }
  }

  let manifest: unknown
  try {
    const content = await readFile(manifestPath, 'utf-8')
    manifest = parseYaml(content)
  } catch (error) {
    return { ok: false, error: [{ path: manifestPath, message: `Failed to parse ${MANIFEST_FILE}: ${error}` }] }
  }

  if (!validateManifest(manifest)) {
    const schemaErrors = (validateManifest.errors ?? []).map(e => ({
      path: `${manifestPath}${e.instancePath}`,
      message: e.message ?? 'Unknown validation error',
    }))
    return { ok: false, error: schemaErrors }
  }

  return { ok: true, value: { manifest, directory: resolve(directory) } }
}

/**
 * Find packages on a search path. A search root holding a manifest is itself
 * a package; otherwise each of its direct subdirectories with a manifest is.
 * When a name occurs twice the first root wins.
 */
export async function discoverPackages(searchPaths: string[]): Promise<Result<DiscoveredPackage[], ValidationError[]>> {
  const packages = new Map<string, DiscoveredPackage>()
  const errors: ValidationError[] = []

  const add = (pkg: DiscoveredPackage): void => {
    if (!packages.has(pkg.manifest.name)) packages.set(pkg.manifest.name, pkg)
  }

  for (const searchPath of searchPaths) {
    if (!(await fileExists(searchPath))) continue
    const rootStat = await lstat(searchPath)
    if (!rootStat.isDirectory()) continue

    if (await fileExists(join(searchPath, MANIFEST_FILE))) {
      const result = await loadPackageManifest(searchPath)
      if (result.ok) add(result.value)
      else errors.push(...result.error)
      continue
    }

    const entries = (await readdir(searchPath)).sort()
    for (const entry of entries) {
      const packageDir = join(searchPath, entry)
      const pkgStat = await lstat(packageDir)
      if (!pkgStat.isDirectory()) continue
      if (!(await fileExists(join(packageDir, MANIFEST_FILE)))) continue

      const result = await loadPackageManifest(packageDir)
      if (result.ok) add(result.value)
      else errors.push(...result.error)
    }
  }

  if (errors.length > 0 && packages.size === 0) {
    return { ok: false, error: errors }
  }

  return { ok: true, value: Array.from(packages.values()) }
}
