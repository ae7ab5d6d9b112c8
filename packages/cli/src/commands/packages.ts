import { resolve } from 'node:path'
import type { Result } from '@msgdef/shared'
import { openWorkspace } from '../lib/workspace.js'

export interface PackagesOptions {
  root?: string
  json?: boolean
}

export interface PackageEntry {
  name: string
  path: string
}

export async function packagesCommand(options: PackagesOptions): Promise<Result<PackageEntry[], string>> {
  const projectRoot = resolve(options.root ?? process.cwd())
  const workspace = await openWorkspace(projectRoot)
  if (!workspace.ok) return workspace

  const { locator } = workspace.value
  const entries: PackageEntry[] = []
  for (const name of locator.packageNames()) {
    const path = locator.locate(name)
    if (path) entries.push({ name, path })
  }

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2))
  } else if (entries.length === 0) {
    console.error('No packages found. Add search roots to packagePath in msgdef.yaml or MSGDEF_PACKAGE_PATH.')
  } else {
    for (const entry of entries) {
      console.log(`${entry.name}\t${entry.path}`)
    }
  }

  return { ok: true, value: entries }
}
