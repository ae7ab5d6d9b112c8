import { createHash } from 'node:crypto'
import { ChecksumMismatchError, DefinitionParseError, WILDCARD_CHECKSUM } from '@msgdef/shared'
import type { SchemaIdentity } from '@msgdef/shared'
import { qualifyMemberType } from './identifier.js'
import type { LineMatcher } from './line-matcher.js'
import { parseMessageDefinition } from './message.js'
import type { MessageField } from './message.js'
import type { DefinitionResolver } from './resolver.js'
import type { BuiltinLookup } from './type-registry.js'

export interface ChecksumContext {
  resolver: DefinitionResolver
  registry: BuiltinLookup
  matcher: LineMatcher
}

function md5(text: string): string {
  return createHash('md5').update(text).digest('hex')
}

function arraySuffix(field: MessageField): string {
  if (!field.array) return ''
  return `[${field.array.size ?? ''}]`
}

/**
 * Text a schema contributes to its fingerprint: constants first, then
 * fields, with every nested type replaced by its own checksum.
 */
export function checksumText(typeId: string, context: ChecksumContext): string {
  return buildText(typeId, context, new Map(), new Set())
}

function buildText(typeId: string, context: ChecksumContext, memo: Map<string, string>, active: Set<string>): string {
  const { resolver, registry, matcher } = context
  const schema = resolver.load(typeId)
  const definition = parseMessageDefinition(schema.typeId, schema.text, matcher)

  active.add(schema.typeId)
  const lines: string[] = []
  for (const constant of definition.constants) {
    lines.push(`${constant.type} ${constant.name}=${constant.value}`)
  }
  for (const field of definition.fields) {
    if (registry.isBuiltin(field.type)) {
      lines.push(`${field.type}${arraySuffix(field)} ${field.name}`)
      continue
    }
    const nested = qualifyMemberType(field.type, resolver.basePackage)
    lines.push(`${checksumOf(nested, context, memo, active, schema.typeId)} ${field.name}`)
  }
  active.delete(schema.typeId)

  return lines.join('\n')
}

function checksumOf(
  typeId: string,
  context: ChecksumContext,
  memo: Map<string, string>,
  active: Set<string>,
  referencedFrom: string
): string {
  const cached = memo.get(typeId)
  if (cached) return cached
  if (active.has(typeId)) {
    throw new DefinitionParseError(referencedFrom, typeId, 'Recursive type reference')
  }
  const checksum = md5(buildText(typeId, context, memo, active))
  memo.set(typeId, checksum)
  return checksum
}

/**
 * 32-character MD5 fingerprint of the fully expanded schema `typeId`.
 */
export function computeChecksum(typeId: string, context: ChecksumContext): string {
  return checksumOf(typeId, context, new Map(), new Set(), typeId)
}

/**
 * Throw unless `expected` matches the identity's checksum. The wildcard on
 * either side matches anything.
 */
export function verifyChecksum(identity: SchemaIdentity, expected: string): void {
  identity.requireValid()
  if (expected === WILDCARD_CHECKSUM || identity.checksum === WILDCARD_CHECKSUM) return
  if (identity.checksum !== expected) {
    throw new ChecksumMismatchError(expected, identity.checksum)
  }
}
