import {
  DefinitionParseError,
  InvalidMessageMemberError,
  NoSuchMessageFieldError,
  NoSuchMessageMemberError,
} from '@msgdef/shared'
import type { LineMatcher } from './line-matcher.js'

export interface MessageConstant {
  kind: 'constant'
  name: string
  type: string
  value: string
}

export interface MessageField {
  kind: 'field'
  name: string
  type: string
  /** null for scalars; `size` is absent for variable-length arrays */
  array: { size?: number } | null
}

export type MessageMember = MessageConstant | MessageField

export function createMember(member: MessageMember): MessageMember {
  if (!member.name || !member.type) throw new InvalidMessageMemberError()
  return member
}

/**
 * Parsed form of one schema text: constants and fields in declaration order.
 */
export class MessageDefinition {
  private readonly members: MessageMember[] = []

  constructor(readonly typeId: string) {}

  get constants(): MessageConstant[] {
    return this.members.filter((m): m is MessageConstant => m.kind === 'constant')
  }

  get fields(): MessageField[] {
    return this.members.filter((m): m is MessageField => m.kind === 'field')
  }

  get size(): number {
    return this.members.length
  }

  add(member: MessageMember): void {
    this.members.push(createMember(member))
  }

  has(name: string): boolean {
    return this.members.some(m => m.name === name)
  }

  member(index: number): MessageMember {
    const member = this.members[index]
    if (!member) throw new NoSuchMessageMemberError(index)
    return member
  }

  field(nameOrIndex: string | number): MessageField {
    const field = typeof nameOrIndex === 'number'
      ? this.fields[nameOrIndex]
      : this.fields.find(f => f.name === nameOrIndex)
    if (!field) throw new NoSuchMessageFieldError(nameOrIndex)
    return field
  }
}

export function parseMessageDefinition(typeId: string, text: string, matcher: LineMatcher): MessageDefinition {
  const definition = new MessageDefinition(typeId)

  for (const line of text.split('\n')) {
    if (matcher.isIgnorable(line)) continue

    let member: MessageMember
    const constant = matcher.matchConstant(line)
    const array = constant ? null : matcher.matchArray(line)
    const scalar = constant || array ? null : matcher.match(line)

    if (constant) {
      member = { kind: 'constant', ...constant }
    } else if (array) {
      const { size, ...rest } = array
      member = { kind: 'field', ...rest, array: size === undefined ? {} : { size } }
    } else if (scalar) {
      member = { kind: 'field', ...scalar, array: null }
    } else {
      throw new DefinitionParseError(typeId, line, 'Line is not a valid member declaration')
    }

    if (definition.has(member.name)) {
      throw new DefinitionParseError(typeId, line, `Duplicate member name [${member.name}]`)
    }
    definition.add(member)
  }

  return definition
}
