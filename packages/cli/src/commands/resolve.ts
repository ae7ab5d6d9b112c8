import { resolve } from 'node:path'
import { isMsgdefError } from '@msgdef/shared'
import type { Result, SchemaIdentity } from '@msgdef/shared'
import { computeChecksum } from '../lib/checksum.js'
import { openWorkspace, stderrLogger } from '../lib/workspace.js'

export interface ResolveOptions {
  root?: string
  json?: boolean
  checksum?: boolean
  verbose?: boolean
}

export async function resolveCommand(typeId: string, options: ResolveOptions): Promise<Result<SchemaIdentity, string>> {
  const projectRoot = resolve(options.root ?? process.cwd())
  const workspace = await openWorkspace(projectRoot, { logger: options.verbose ? stderrLogger : undefined })
  if (!workspace.ok) return workspace

  let identity: SchemaIdentity
  try {
    identity = workspace.value.resolver.resolve(typeId)
    if (!identity.isValid()) {
      return { ok: false, error: `Message type [${typeId}] has an empty definition` }
    }
    if (options.checksum) {
      identity.checksum = computeChecksum(typeId, workspace.value)
    }
  } catch (error) {
    if (!isMsgdefError(error)) throw error
    return { ok: false, error: error.message }
  }

  if (options.json) {
    console.log(JSON.stringify(identity, null, 2))
  } else {
    if (options.checksum) console.error(`${identity.typeId} [${identity.checksum}]`)
    console.log(identity.definition)
  }

  return { ok: true, value: identity }
}
