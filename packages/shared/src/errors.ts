export type MsgdefErrorCode =
  | 'invalid-operation'
  | 'invalid-data-type'
  | 'immutable-data-type'
  | 'no-such-data-type'
  | 'ambiguous-data-type-identifier'
  | 'data-type-mismatch'
  | 'invalid-message-member'
  | 'no-such-message-member'
  | 'checksum-mismatch'
  | 'no-such-message-field'
  | 'invalid-message-type'
  | 'definition-parse'
  | 'package-not-found'
  | 'file-open'

/**
 * Base class of every failure raised by the resolver, the type registry and
 * the variant machinery. Callers branch on `code` (or `instanceof`).
 */
export abstract class MsgdefError extends Error {
  abstract readonly code: MsgdefErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export function isMsgdefError(value: unknown): value is MsgdefError {
  return value instanceof MsgdefError
}

export class InvalidOperationError extends MsgdefError {
  readonly code = 'invalid-operation'

  constructor() {
    super('Attempted execution of an invalid operation')
  }
}

export class InvalidDataTypeError extends MsgdefError {
  readonly code = 'invalid-data-type'

  constructor() {
    super('Attempted use of an invalid data type')
  }
}

export class ImmutableDataTypeError extends MsgdefError {
  readonly code = 'immutable-data-type'

  constructor() {
    super('Attempted modification of an immutable data type')
  }
}

export class NoSuchDataTypeError extends MsgdefError {
  readonly code = 'no-such-data-type'

  constructor(readonly identifier: string) {
    super(`Data type [${identifier}] does not exist`)
  }
}

export class AmbiguousDataTypeIdentifierError extends MsgdefError {
  readonly code = 'ambiguous-data-type-identifier'

  constructor(readonly identifier: string) {
    super(`Data type identifier [${identifier}] is used ambiguously`)
  }
}

export class DataTypeMismatchError extends MsgdefError {
  readonly code = 'data-type-mismatch'

  constructor(readonly expected: string, readonly provided: string) {
    super(`Provided data type [${provided}] mismatches expected data type [${expected}]`)
  }
}

export class InvalidMessageMemberError extends MsgdefError {
  readonly code = 'invalid-message-member'

  constructor() {
    super('Attempted use of an invalid message member')
  }
}

export class NoSuchMessageMemberError extends MsgdefError {
  readonly code = 'no-such-message-member'

  constructor(readonly index: number) {
    super(`Member with index [${index}] does not exist`)
  }
}

export class ChecksumMismatchError extends MsgdefError {
  readonly code = 'checksum-mismatch'

  constructor(readonly expected: string, readonly provided: string) {
    super(`Provided checksum [${provided}] mismatches expected checksum [${expected}]`)
  }
}

export class NoSuchMessageFieldError extends MsgdefError {
  readonly code = 'no-such-message-field'

  // Fields are looked up either by position or by name
  constructor(readonly field: number | string) {
    super(typeof field === 'number'
      ? `Field with index [${field}] does not exist`
      : `Field with name [${field}] does not exist`)
  }
}

export class InvalidMessageTypeError extends MsgdefError {
  readonly code = 'invalid-message-type'

  constructor(readonly value: string) {
    super(`Message type [${value}] is invalid`)
  }
}

export class DefinitionParseError extends MsgdefError {
  readonly code = 'definition-parse'

  constructor(readonly typeId: string, readonly line: string, readonly reason: string) {
    super(`Error parsing the definition for [${typeId}]: ${reason}\n${line}`)
  }
}

export class PackageNotFoundError extends MsgdefError {
  readonly code = 'package-not-found'

  constructor(readonly packageName: string) {
    super(`Package [${packageName}] not found`)
  }
}

export class FileOpenError extends MsgdefError {
  readonly code = 'file-open'

  constructor(readonly filename: string) {
    super(`Error opening file [${filename}]`)
  }
}
