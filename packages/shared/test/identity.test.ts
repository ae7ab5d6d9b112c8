import { describe, it, expect } from 'vitest'
import { InvalidOperationError, SchemaIdentity } from '../src/index.js'

const CHECKSUM = '0123456789abcdef0123456789abcdef'

describe('SchemaIdentity', () => {
  it('starts empty with the wildcard checksum', () => {
    const identity = new SchemaIdentity()
    expect(identity.toJSON()).toEqual({ typeId: '', checksum: '*', definition: '' })
    expect(identity.isValid()).toBe(false)
  })

  it('is valid with a wildcard or a 32-character checksum', () => {
    expect(new SchemaIdentity('geo/Point', '*', 'float64 x\n').isValid()).toBe(true)
    expect(new SchemaIdentity('geo/Point', CHECKSUM, 'float64 x\n').isValid()).toBe(true)
  })

  it('becomes invalid when any single condition is broken', () => {
    const valid = new SchemaIdentity('geo/Point', CHECKSUM, 'float64 x\n')

    const noChecksum = valid.clone()
    noChecksum.checksum = ''
    const shortChecksum = valid.clone()
    shortChecksum.checksum = CHECKSUM.slice(1)
    const longChecksum = valid.clone()
    longChecksum.checksum = `${CHECKSUM}0`
    const noType = valid.clone()
    noType.typeId = ''
    const noDefinition = valid.clone()
    noDefinition.definition = ''

    for (const identity of [noChecksum, shortChecksum, longChecksum, noType, noDefinition]) {
      expect(identity.isValid()).toBe(false)
    }
    expect(valid.isValid()).toBe(true)
  })

  it('clears back to the empty state', () => {
    const identity = new SchemaIdentity('geo/Point', CHECKSUM, 'float64 x\n')
    identity.clear()
    expect(identity.toJSON()).toEqual({ typeId: '', checksum: '*', definition: '' })
  })

  it('copies are independent', () => {
    const original = new SchemaIdentity('geo/Point', '*', 'float64 x\n')
    const copy = original.clone()
    copy.definition = 'float64 y\n'
    expect(original.definition).toBe('float64 x\n')
  })

  it('compares type and checksum but not definition', () => {
    const a = new SchemaIdentity('geo/Point', CHECKSUM, 'float64 x\n')
    expect(a.equals(new SchemaIdentity('geo/Point', CHECKSUM, 'other'))).toBe(true)
    expect(a.equals(new SchemaIdentity('geo/Point', '*', 'float64 x\n'))).toBe(false)
    expect(a.equals(new SchemaIdentity('geo/Pose', CHECKSUM, 'float64 x\n'))).toBe(false)
  })

  it('builds from plain data and prints as its type', () => {
    const identity = SchemaIdentity.from({ typeId: 'geo/Point', checksum: '*', definition: 'float64 x\n' })
    expect(String(identity)).toBe('geo/Point')
  })

  it('requireValid throws for incomplete identities', () => {
    expect(() => new SchemaIdentity().requireValid()).toThrow(InvalidOperationError)
    const identity = new SchemaIdentity('geo/Point', '*', 'float64 x\n')
    expect(identity.requireValid()).toBe(identity)
  })
})
