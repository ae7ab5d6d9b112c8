import { readdir, access } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { isMsgdefError } from '@msgdef/shared'
import type { LineMatcher } from './line-matcher.js'
import { loadPackageManifest, MANIFEST_FILE } from './loader.js'
import type { PackageLocator } from './locator.js'
import { parseMessageDefinition } from './message.js'
import { MESSAGE_DIRECTORY, MESSAGE_EXTENSION } from './resolver.js'
import type { DefinitionResolver } from './resolver.js'

export interface VerificationIssue {
  severity: 'error' | 'warning'
  code: string
  message: string
  file?: string
}

export interface VerificationResult {
  package: string
  passed: boolean
  messages: string[]
  issues: VerificationIssue[]
}

export interface VerifyContext {
  locator: PackageLocator
  resolver: DefinitionResolver
  matcher: LineMatcher
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

function finish(packageName: string, messages: string[], issues: VerificationIssue[]): VerificationResult {
  const passed = !issues.some(i => i.severity === 'error')
  return { package: packageName, passed, messages, issues }
}

/**
 * Check that a package has a valid manifest and that every message in it
 * parses and resolves.
 */
export async function verifyPackage(packageName: string, context: VerifyContext): Promise<VerificationResult> {
  const issues: VerificationIssue[] = []
  const messages: string[] = []

  const directory = context.locator.locate(packageName)
  if (!directory) {
    issues.push({ severity: 'error', code: 'PACKAGE-NOT-FOUND', message: `Package [${packageName}] not found` })
    return finish(packageName, messages, issues)
  }

  // Manifest
  if (!(await fileExists(join(directory, MANIFEST_FILE)))) {
    issues.push({ severity: 'error', code: 'MANIFEST-MISSING', message: `${MANIFEST_FILE} not found`, file: MANIFEST_FILE })
    return finish(packageName, messages, issues)
  }
  const manifest = await loadPackageManifest(directory)
  if (!manifest.ok) {
    for (const error of manifest.error) {
      issues.push({ severity: 'error', code: 'MANIFEST-INVALID', message: `${error.path}: ${error.message}`, file: MANIFEST_FILE })
    }
    return finish(packageName, messages, issues)
  }
  if (manifest.value.manifest.name !== packageName) {
    issues.push({
      severity: 'warning', code: 'MANIFEST-NAME',
      message: `Manifest declares [${manifest.value.manifest.name}] but the package is located as [${packageName}]`,
      file: MANIFEST_FILE,
    })
  }

  // Message directory
  const messageDir = join(directory, MESSAGE_DIRECTORY)
  if (!(await fileExists(messageDir))) {
    issues.push({ severity: 'warning', code: 'MSG-DIR-MISSING', message: `No ${MESSAGE_DIRECTORY}/ directory` })
    return finish(packageName, messages, issues)
  }

  const files = (await readdir(messageDir)).filter(f => f.endsWith(MESSAGE_EXTENSION)).sort()
  for (const file of files) {
    const typeId = `${packageName}/${basename(file, MESSAGE_EXTENSION)}`
    const relativeFile = `${MESSAGE_DIRECTORY}/${file}`
    messages.push(typeId)

    try {
      const schema = context.resolver.load(typeId)
      parseMessageDefinition(typeId, schema.text, context.matcher)
    } catch (error) {
      if (!isMsgdefError(error)) throw error
      issues.push({ severity: 'error', code: 'MSG-PARSE', message: error.message, file: relativeFile })
      continue
    }

    try {
      context.resolver.resolve(typeId)
    } catch (error) {
      if (!isMsgdefError(error)) throw error
      issues.push({ severity: 'error', code: 'MSG-RESOLVE', message: error.message, file: relativeFile })
    }
  }

  return finish(packageName, messages, issues)
}
