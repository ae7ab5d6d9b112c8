import {
  AmbiguousDataTypeIdentifierError,
  ImmutableDataTypeError,
  InvalidOperationError,
  NoSuchDataTypeError,
  ValueVariantFactory,
  valueType,
} from '@msgdef/shared'
import type { ValueType, Variant, VariantFactory } from '@msgdef/shared'

export interface Time {
  sec: number
  nsec: number
}

/**
 * Read-only view of a registry: the only capability dependency discovery
 * needs.
 */
export interface BuiltinLookup {
  isBuiltin(typeId: string): boolean
}

function numberType(name: string): ValueType<number> {
  return valueType({
    name,
    create: () => 0,
    is: (value: unknown): value is number => typeof value === 'number',
  })
}

function bigintType(name: string): ValueType<bigint> {
  return valueType({
    name,
    create: () => 0n,
    is: (value: unknown): value is bigint => typeof value === 'bigint',
  })
}

function timeType(name: string): ValueType<Time> {
  return valueType({
    name,
    create: () => ({ sec: 0, nsec: 0 }),
    is: (value: unknown): value is Time =>
      typeof value === 'object' && value !== null &&
      'sec' in value && typeof value.sec === 'number' &&
      'nsec' in value && typeof value.nsec === 'number',
    clone: (value) => ({ sec: value.sec, nsec: value.nsec }),
  })
}

const boolType = valueType({
  name: 'bool',
  create: () => false,
  is: (value: unknown): value is boolean => typeof value === 'boolean',
})

const stringType = valueType({
  name: 'string',
  create: () => '',
  is: (value: unknown): value is string => typeof value === 'string',
})

export const builtinTypes = {
  bool: boolType,
  int8: numberType('int8'),
  uint8: numberType('uint8'),
  int16: numberType('int16'),
  uint16: numberType('uint16'),
  int32: numberType('int32'),
  uint32: numberType('uint32'),
  int64: bigintType('int64'),
  uint64: bigintType('uint64'),
  float32: numberType('float32'),
  float64: numberType('float64'),
  string: stringType,
  time: timeType('time'),
  duration: timeType('duration'),
  // Deprecated aliases of int8 and uint8
  byte: numberType('byte'),
  char: numberType('char'),
} as const

export type BuiltinTypeName = keyof typeof builtinTypes

/**
 * Maps type names to the factories producing their default values. Built-in
 * primitives are registered up front and cannot be replaced.
 */
export class TypeRegistry implements BuiltinLookup {
  private readonly factories = new Map<string, VariantFactory>()
  private readonly builtins = new Set<string>()
  private frozen = false

  constructor() {
    for (const type of Object.values(builtinTypes)) {
      this.builtins.add(type.name)
      this.factories.set(type.name, new ValueVariantFactory<unknown>(type))
    }
  }

  isBuiltin(typeId: string): boolean {
    return this.builtins.has(typeId)
  }

  has(typeId: string): boolean {
    return this.factories.has(typeId)
  }

  register(typeId: string, factory: VariantFactory): void {
    if (this.frozen) throw new InvalidOperationError()
    if (this.builtins.has(typeId)) throw new ImmutableDataTypeError()

    const existing = this.factories.get(typeId)
    if (existing) {
      if (existing.typeInfo().equals(factory.typeInfo())) return
      throw new AmbiguousDataTypeIdentifierError(typeId)
    }
    this.factories.set(typeId, factory)
  }

  factory(typeId: string): VariantFactory {
    const factory = this.factories.get(typeId)
    if (!factory) throw new NoSuchDataTypeError(typeId)
    return factory
  }

  createVariant(typeId: string): Variant {
    return this.factory(typeId).createVariant()
  }

  /** Reject further registrations; lookups keep working. */
  freeze(): this {
    this.frozen = true
    return this
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  typeIds(): string[] {
    return Array.from(this.factories.keys())
  }
}
