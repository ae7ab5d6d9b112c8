import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { FileOpenError, PackageNotFoundError, SchemaIdentity } from '@msgdef/shared'
import { DEFAULT_BASE_PACKAGE, parseTypeIdentifier, qualifyMemberType } from './identifier.js'
import type { FieldMatcher } from './line-matcher.js'
import type { PackageLocator } from './locator.js'
import type { BuiltinLookup } from './type-registry.js'

export const MESSAGE_DIRECTORY = 'msg'
export const MESSAGE_EXTENSION = '.msg'
export const DEFINITION_SEPARATOR = '='.repeat(80)

export interface Logger {
  debug(message: string): void
}

export interface ResolverOptions {
  locator: PackageLocator
  registry: BuiltinLookup
  matcher: FieldMatcher
  basePackage?: string
  logger?: Logger
}

export interface LoadedSchema {
  /** Package-qualified identifier, with the base package filled in for a bare Header */
  typeId: string
  package: string
  localType: string
  filename: string
  text: string
}

/** Pending work for a single resolve call. */
interface ResolutionState {
  visited: Set<string>
  pending: string[]
}

export function messageFilename(packageRoot: string, localType: string): string {
  return join(packageRoot, MESSAGE_DIRECTORY, `${localType}${MESSAGE_EXTENSION}`)
}

export class DefinitionResolver {
  readonly basePackage: string
  private readonly locator: PackageLocator
  private readonly registry: BuiltinLookup
  private readonly matcher: FieldMatcher
  private readonly logger?: Logger

  constructor(options: ResolverOptions) {
    this.locator = options.locator
    this.registry = options.registry
    this.matcher = options.matcher
    this.basePackage = options.basePackage ?? DEFAULT_BASE_PACKAGE
    this.logger = options.logger
  }

  /**
   * Locate and read the schema text of a single type.
   */
  load(typeId: string): LoadedSchema {
    const parsed = parseTypeIdentifier(typeId, this.basePackage)
    if (!parsed.ok) throw parsed.error
    const { package: pkg, localType } = parsed.value

    const packageRoot = this.locator.locate(pkg)
    if (!packageRoot) throw new PackageNotFoundError(pkg)

    const filename = messageFilename(packageRoot, localType)
    let text: string
    try {
      text = readFileSync(filename, 'utf-8')
    } catch {
      throw new FileOpenError(filename)
    }

    return { typeId: `${pkg}/${localType}`, package: pkg, localType, filename, text }
  }

  /**
   * Member types referenced by one schema text, in declaration order.
   * Bare "Header" is qualified with the base package.
   */
  memberTypes(text: string): string[] {
    const types: string[] = []
    for (const line of text.split('\n')) {
      const member = this.matcher.matchArray(line) ?? this.matcher.match(line)
      if (member) types.push(qualifyMemberType(member.type, this.basePackage))
    }
    return types
  }

  /**
   * Resolve `rootTypeId` into an identity whose definition inlines every
   * nested schema once, in breadth-first discovery order. The checksum is
   * left as the wildcard.
   */
  resolve(rootTypeId: string): SchemaIdentity {
    const state: ResolutionState = {
      visited: new Set([rootTypeId]),
      pending: [rootTypeId],
    }
    let definition = ''

    while (state.pending.length > 0) {
      const current = state.pending[0]
      const schema = this.load(current)

      if (schema.text) {
        for (const memberType of this.memberTypes(schema.text)) {
          if (this.registry.isBuiltin(memberType) || state.visited.has(memberType)) continue
          state.visited.add(memberType)
          state.pending.push(memberType)
        }

        if (definition) {
          definition += `\n${DEFINITION_SEPARATOR}\n`
          definition += `MSG: ${current}\n`
        }
        definition += schema.text
      }

      this.logger?.debug(`Resolved ${current} from ${schema.filename}`)
      state.pending.shift()
    }

    const identity = new SchemaIdentity()
    if (definition) {
      identity.typeId = rootTypeId
      identity.definition = definition
    }
    return identity
  }
}
