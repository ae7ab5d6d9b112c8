import { InvalidOperationError } from './errors.js'

export const WILDCARD_CHECKSUM = '*'
export const CHECKSUM_LENGTH = 32

export interface SchemaIdentityData {
  typeId: string
  checksum: string
  definition: string
}

/**
 * Identity of a message schema: its package-qualified type name, the checksum
 * of the fully expanded schema (or the `*` wildcard) and the flattened
 * definition text.
 */
export class SchemaIdentity {
  typeId: string
  checksum: string
  definition: string

  constructor(typeId = '', checksum: string = WILDCARD_CHECKSUM, definition = '') {
    this.typeId = typeId
    this.checksum = checksum
    this.definition = definition
  }

  static from(data: SchemaIdentityData): SchemaIdentity {
    return new SchemaIdentity(data.typeId, data.checksum, data.definition)
  }

  isValid(): boolean {
    return this.checksum.length > 0 &&
      (this.checksum === WILDCARD_CHECKSUM || this.checksum.length === CHECKSUM_LENGTH) &&
      this.typeId.length > 0 &&
      this.definition.length > 0
  }

  /**
   * Throw unless the identity is complete. Anything that hands an identity
   * to a consumer expecting a usable schema goes through here.
   */
  requireValid(): this {
    if (!this.isValid()) throw new InvalidOperationError()
    return this
  }

  clear(): void {
    this.typeId = ''
    this.checksum = WILDCARD_CHECKSUM
    this.definition = ''
  }

  clone(): SchemaIdentity {
    return new SchemaIdentity(this.typeId, this.checksum, this.definition)
  }

  equals(other: SchemaIdentity): boolean {
    return this.typeId === other.typeId && this.checksum === other.checksum
  }

  toJSON(): SchemaIdentityData {
    return { typeId: this.typeId, checksum: this.checksum, definition: this.definition }
  }

  toString(): string {
    return this.typeId
  }
}
