import type { Result, WorkspaceConfig } from '@msgdef/shared'
import { loadWorkspaceConfig } from './config.js'
import { lineMatcher } from './line-matcher.js'
import type { LineMatcher } from './line-matcher.js'
import { createPackageLocator, StaticPackageLocator } from './locator.js'
import { DefinitionResolver } from './resolver.js'
import type { Logger } from './resolver.js'
import { TypeRegistry } from './type-registry.js'

export interface Workspace {
  root: string
  config: WorkspaceConfig
  locator: StaticPackageLocator
  registry: TypeRegistry
  matcher: LineMatcher
  resolver: DefinitionResolver
}

export interface WorkspaceOptions {
  env?: NodeJS.ProcessEnv
  logger?: Logger
}

/**
 * Load the configuration of a project and wire the resolver to the
 * packages it can see.
 */
export async function openWorkspace(projectRoot: string, options: WorkspaceOptions = {}): Promise<Result<Workspace, string>> {
  const config = await loadWorkspaceConfig(projectRoot, options.env)
  if (!config.ok) return config

  const locator = await createPackageLocator(config.value, projectRoot)
  if (!locator.ok) {
    const details = locator.error.map(e => `${e.path}: ${e.message}`).join('; ')
    return { ok: false, error: `Failed to discover packages: ${details}` }
  }

  const registry = new TypeRegistry().freeze()
  const resolver = new DefinitionResolver({
    locator: locator.value,
    registry,
    matcher: lineMatcher,
    basePackage: config.value.basePackage,
    logger: options.logger,
  })

  return {
    ok: true,
    value: {
      root: projectRoot,
      config: config.value,
      locator: locator.value,
      registry,
      matcher: lineMatcher,
      resolver,
    },
  }
}

export const stderrLogger: Logger = {
  debug(message) {
    console.error(message)
  },
}
