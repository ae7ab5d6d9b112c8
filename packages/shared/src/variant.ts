import { DataTypeMismatchError, InvalidOperationError } from './errors.js'

/**
 * Runtime identity of a concrete value type. Identities are compared by
 * reference: every `ValueType` owns exactly one.
 */
export class TypeIdentity {
  constructor(readonly name: string) {}

  equals(other: TypeIdentity): boolean {
    return this === other
  }

  toString(): string {
    return this.name
  }
}

export interface ValueTypeDefinition<T> {
  name: string
  create(): T
  is(value: unknown): value is T
  clone?(value: T): T
}

export interface ValueType<T> {
  readonly name: string
  readonly identity: TypeIdentity
  create(): T
  is(value: unknown): value is T
  clone(value: T): T
}

function cloneData<T>(value: T): T {
  try {
    return structuredClone(value)
  } catch (error) {
    if (error instanceof Error && error.name === 'DataCloneError') throw new InvalidOperationError()
    throw error
  }
}

/**
 * Describe a concrete type by its default constructor and a guard. Values
 * are deep-copied with `structuredClone` unless the definition says otherwise.
 */
export function valueType<T>(definition: ValueTypeDefinition<T>): ValueType<T> {
  const clone = definition.clone
  return {
    name: definition.name,
    identity: new TypeIdentity(definition.name),
    create: () => definition.create(),
    is: (value: unknown): value is T => definition.is(value),
    clone: clone ? (value: T) => clone(value) : (value: T) => cloneData(value),
  }
}

function copyValue(value: unknown, seen: Map<object, unknown>): unknown {
  if (typeof value !== 'object' || value === null) return value
  if (seen.has(value)) return seen.get(value)

  if (value instanceof Date) return new Date(value.getTime())
  if (value instanceof RegExp) return new RegExp(value.source, value.flags)
  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) return cloneData(value)
  if (value instanceof WeakMap || value instanceof WeakSet || value instanceof Promise) {
    throw new InvalidOperationError()
  }
  if (value instanceof Map) {
    const target = new Map<unknown, unknown>()
    seen.set(value, target)
    for (const [key, entry] of value) target.set(copyValue(key, seen), copyValue(entry, seen))
    return target
  }
  if (value instanceof Set) {
    const target = new Set<unknown>()
    seen.set(value, target)
    for (const entry of value) target.add(copyValue(entry, seen))
    return target
  }

  const target: object = Array.isArray(value) ? [] : Object.create(Object.getPrototypeOf(value))
  seen.set(value, target)
  copyOwnProperties(value, target, seen)
  return target
}

function copyOwnProperties(source: object, target: object, seen: Map<object, unknown>): void {
  for (const key of Reflect.ownKeys(source)) {
    const descriptor = Reflect.getOwnPropertyDescriptor(source, key)
    if (!descriptor) continue
    if ('value' in descriptor) {
      // Functions the constructor already put on the target stay bound to it
      if (typeof descriptor.value === 'function' && Object.hasOwn(target, key)) continue
      descriptor.value = copyValue(descriptor.value, seen)
    }
    Reflect.defineProperty(target, key, descriptor)
  }
}

const classIdentities = new WeakMap<object, TypeIdentity>()

/**
 * Describe a default-constructible class. The identity is interned per
 * constructor, so repeated calls for the same class compare equal.
 *
 * The default clone constructs a fresh instance and deep-copies its own
 * properties; nested objects keep their prototypes. `#private` fields are
 * not reachable that way, so classes holding them pass their own `clone`.
 */
export function classType<T extends object>(ctor: new () => T, clone?: (value: T) => T): ValueType<T> {
  let identity = classIdentities.get(ctor)
  if (!identity) {
    identity = new TypeIdentity(ctor.name)
    classIdentities.set(ctor, identity)
  }
  return {
    name: ctor.name,
    identity,
    create: () => new ctor(),
    is: (value: unknown): value is T => value instanceof ctor,
    clone: clone ?? ((value: T) => {
      const copy = new ctor()
      copyOwnProperties(value, copy, new Map<object, unknown>([[value, copy]]))
      return copy
    }),
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value === 'object') return value.constructor?.name ?? 'object'
  return typeof value
}

/**
 * Type-erased container holding exactly one value together with the
 * identity of its type.
 */
export class Variant<T = unknown> {
  private current: T

  constructor(readonly type: ValueType<T>, value: T) {
    if (!type.is(value)) throw new DataTypeMismatchError(type.name, describeValue(value))
    this.current = value
  }

  get identity(): TypeIdentity {
    return this.type.identity
  }

  get value(): T {
    return this.current
  }

  is(identity: TypeIdentity): boolean {
    return this.type.identity.equals(identity)
  }

  /**
   * Retrieve the value as `type`, failing if the variant holds another type.
   */
  get<U>(type: ValueType<U>): U {
    const value: unknown = this.current
    if (!this.is(type.identity) || !type.is(value)) {
      throw new DataTypeMismatchError(type.name, this.type.name)
    }
    return value
  }

  set(value: T): void {
    if (!this.type.is(value)) throw new DataTypeMismatchError(this.type.name, describeValue(value))
    this.current = value
  }

  clone(): Variant<T> {
    return new Variant(this.type, this.type.clone(this.current))
  }

  toString(): string {
    return `${this.type.name}(${String(this.current)})`
  }
}

export interface VariantFactory<T = unknown> {
  typeInfo(): TypeIdentity
  createVariant(): Variant<T>
}

export class ValueVariantFactory<T> implements VariantFactory<T> {
  constructor(private readonly type: ValueType<T>) {}

  typeInfo(): TypeIdentity {
    return this.type.identity
  }

  createVariant(): Variant<T> {
    return new Variant(this.type, this.type.create())
  }
}

export function createVariantFactory<T>(type: ValueType<T>): VariantFactory<T> {
  return new ValueVariantFactory(type)
}
