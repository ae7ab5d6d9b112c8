import { resolve } from 'node:path'
import { isMsgdefError } from '@msgdef/shared'
import type { Result } from '@msgdef/shared'
import { computeChecksum, verifyChecksum } from '../lib/checksum.js'
import { openWorkspace, stderrLogger } from '../lib/workspace.js'

export interface ChecksumOptions {
  root?: string
  expect?: string
  verbose?: boolean
}

export async function checksumCommand(typeId: string, options: ChecksumOptions): Promise<Result<string, string>> {
  const projectRoot = resolve(options.root ?? process.cwd())
  const workspace = await openWorkspace(projectRoot, { logger: options.verbose ? stderrLogger : undefined })
  if (!workspace.ok) return workspace

  try {
    const identity = workspace.value.resolver.resolve(typeId)
    if (!identity.isValid()) {
      return { ok: false, error: `Message type [${typeId}] has an empty definition` }
    }
    identity.checksum = computeChecksum(typeId, workspace.value)
    console.log(identity.checksum)

    if (options.expect) verifyChecksum(identity, options.expect)
    return { ok: true, value: identity.checksum }
  } catch (error) {
    if (!isMsgdefError(error)) throw error
    return { ok: false, error: error.message }
  }
}
