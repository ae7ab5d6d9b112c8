import { describe, it, expect } from 'vitest'
import {
  DefinitionParseError,
  InvalidMessageMemberError,
  NoSuchMessageFieldError,
  NoSuchMessageMemberError,
} from '@msgdef/shared'
import { MessageDefinition, parseMessageDefinition } from '../src/lib/message.js'
import { lineMatcher } from '../src/lib/line-matcher.js'

const IMU = `# Inertial measurement
Header header
uint8 STATUS_OK=0
uint8 STATUS_ERROR = 1  # failure
geo/Quaternion orientation
float64[9] orientation_covariance
int16[] samples
`

describe('parseMessageDefinition', () => {
  it('separates constants from fields in declaration order', () => {
    const definition = parseMessageDefinition('sensors/Imu', IMU, lineMatcher)
    expect(definition.typeId).toBe('sensors/Imu')
    expect(definition.size).toBe(6)
    expect(definition.constants).toEqual([
      { kind: 'constant', type: 'uint8', name: 'STATUS_OK', value: '0' },
      { kind: 'constant', type: 'uint8', name: 'STATUS_ERROR', value: '1' },
    ])
    expect(definition.fields).toEqual([
      { kind: 'field', type: 'Header', name: 'header', array: null },
      { kind: 'field', type: 'geo/Quaternion', name: 'orientation', array: null },
      { kind: 'field', type: 'float64', name: 'orientation_covariance', array: { size: 9 } },
      { kind: 'field', type: 'int16', name: 'samples', array: {} },
    ])
  })

  it('looks up members by index and fields by name or index', () => {
    const definition = parseMessageDefinition('sensors/Imu', IMU, lineMatcher)
    expect(definition.member(1).name).toBe('STATUS_OK')
    expect(definition.field('samples').type).toBe('int16')
    expect(definition.field(1).name).toBe('orientation')
    expect(() => definition.member(6)).toThrow(new NoSuchMessageMemberError(6))
    expect(() => definition.field('missing')).toThrow(new NoSuchMessageFieldError('missing'))
    expect(() => definition.field(4)).toThrow('Field with index [4] does not exist')
  })

  it('reports lines that are not declarations', () => {
    try {
      parseMessageDefinition('a/Broken', 'int32 x\nthis is not valid\n', lineMatcher)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(DefinitionParseError)
      if (error instanceof DefinitionParseError) {
        expect(error.typeId).toBe('a/Broken')
        expect(error.line).toBe('this is not valid')
        expect(error.message).toBe(
          'Error parsing the definition for [a/Broken]: Line is not a valid member declaration\nthis is not valid'
        )
      }
    }
  })

  it('reports duplicate member names', () => {
    expect(() => parseMessageDefinition('a/Dup', 'int32 x\nfloat64 x\n', lineMatcher))
      .toThrow('Duplicate member name [x]')
  })

  it('parses an empty text into an empty definition', () => {
    expect(parseMessageDefinition('a/Empty', '', lineMatcher).size).toBe(0)
  })
})

describe('MessageDefinition.add', () => {
  it('rejects members without a name or type', () => {
    const definition = new MessageDefinition('a/Manual')
    expect(() => definition.add({ kind: 'field', name: '', type: 'int32', array: null }))
      .toThrow(InvalidMessageMemberError)
    expect(() => definition.add({ kind: 'constant', name: 'X', type: '', value: '1' }))
      .toThrow(InvalidMessageMemberError)
  })
})
