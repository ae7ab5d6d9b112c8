import { readFile, access } from 'node:fs/promises'
import { delimiter, join } from 'node:path'
import Ajv from 'ajv'
import { parse as parseYaml } from 'yaml'
import { workspaceConfigSchema } from '@msgdef/shared'
import type { Result, WorkspaceConfig } from '@msgdef/shared'
import { DEFAULT_BASE_PACKAGE } from './identifier.js'

export const CONFIG_FILE = 'msgdef.yaml'

const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<Partial<WorkspaceConfig>>(workspaceConfigSchema)

export function defaultWorkspaceConfig(): WorkspaceConfig {
  return { packagePath: [], basePackage: DEFAULT_BASE_PACKAGE, packages: {} }
}

function applyEnvironment(config: WorkspaceConfig, env: NodeJS.ProcessEnv): WorkspaceConfig {
  // MSGDEF_PACKAGE_PATH appends search roots, MSGDEF_BASE_PACKAGE replaces the base package
  const extraPaths = (env.MSGDEF_PACKAGE_PATH ?? '').split(delimiter).filter(p => p.length > 0)
  return {
    ...config,
    packagePath: [...config.packagePath, ...extraPaths],
    basePackage: env.MSGDEF_BASE_PACKAGE || config.basePackage,
  }
}

/**
 * Load msgdef.yaml from the project root, falling back to defaults when the
 * file does not exist.
 */
export async function loadWorkspaceConfig(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Result<WorkspaceConfig, string>> {
  const configPath = join(projectRoot, CONFIG_FILE)
  try {
    await access(configPath)
  } catch {
    return { ok: true, value: applyEnvironment(defaultWorkspaceConfig(), env) }
  }

  let parsed: unknown
  try {
    const content = await readFile(configPath, 'utf-8')
    parsed = parseYaml(content)
  } catch (error) {
    return { ok: false, error: `Failed to parse ${CONFIG_FILE}: ${error}` }
  }

  if (parsed === null || typeof parsed !== 'object') {
    return { ok: false, error: `${CONFIG_FILE} is empty or not a valid YAML object` }
  }

  if (!validateConfig(parsed)) {
    const details = (validateConfig.errors ?? [])
      .map(e => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ')
    return { ok: false, error: `Invalid ${CONFIG_FILE}: ${details}` }
  }

  const defaults = defaultWorkspaceConfig()
  const config: WorkspaceConfig = {
    packagePath: parsed.packagePath ?? defaults.packagePath,
    basePackage: parsed.basePackage ?? defaults.basePackage,
    packages: parsed.packages ?? defaults.packages,
  }
  return { ok: true, value: applyEnvironment(config, env) }
}
