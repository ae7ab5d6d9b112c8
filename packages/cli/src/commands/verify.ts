import { resolve } from 'node:path'
import type { Result } from '@msgdef/shared'
import { verifyPackage, type VerificationResult } from '../lib/verifier.js'
import { openWorkspace } from '../lib/workspace.js'

export interface VerifyOptions {
  root?: string
  json?: boolean
}

export async function verifyCommand(packageName: string, options: VerifyOptions): Promise<Result<VerificationResult, string>> {
  const projectRoot = resolve(options.root ?? process.cwd())
  const workspace = await openWorkspace(projectRoot)
  if (!workspace.ok) return workspace

  const result = await verifyPackage(packageName, workspace.value)

  if (options.json) {
    console.log(JSON.stringify(result, null, 2))
  } else {
    console.error(`\nVerification of ${packageName}: ${result.passed ? '✅ PASSED' : '❌ FAILED'}\n`)
    for (const issue of result.issues) {
      const icon = issue.severity === 'error' ? '✗' : '⚠'
      const file = issue.file ? ` (${issue.file})` : ''
      console.error(`  ${icon} [${issue.code}] ${issue.message}${file}`)
    }
    if (result.issues.length === 0) {
      console.error(`  ${result.messages.length} message(s) checked.`)
    }
    console.error('')
  }

  return { ok: true, value: result }
}
