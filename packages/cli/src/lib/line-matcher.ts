const TYPE_PATTERN = '[A-Za-z][A-Za-z0-9_]*(?:/[A-Za-z][A-Za-z0-9_]*)?'
const NAME_PATTERN = '[A-Za-z][A-Za-z0-9_]*'

const fieldRegex = new RegExp(`^\\s*(${TYPE_PATTERN})\\s+(${NAME_PATTERN})\\s*$`)
const arrayRegex = new RegExp(`^\\s*(${TYPE_PATTERN})\\[(\\d*)\\]\\s+(${NAME_PATTERN})\\s*$`)
const constantRegex = new RegExp(`^\\s*(${TYPE_PATTERN})\\s+(${NAME_PATTERN})\\s*=(.*)$`)

export interface FieldMatch {
  name: string
  type: string
}

export interface ArrayFieldMatch extends FieldMatch {
  /** Fixed length; absent for variable-length arrays */
  size?: number
}

export interface ConstantMatch {
  name: string
  type: string
  value: string
}

/**
 * The part of the grammar dependency discovery needs: recognising field
 * declarations and the member type they reference.
 */
export interface FieldMatcher {
  matchArray(line: string): ArrayFieldMatch | null
  match(line: string): FieldMatch | null
}

export interface LineMatcher extends FieldMatcher {
  matchConstant(line: string): ConstantMatch | null
  isIgnorable(line: string): boolean
}

function stripComment(line: string): string {
  const index = line.indexOf('#')
  return index === -1 ? line : line.substring(0, index)
}

export const lineMatcher: LineMatcher = {
  matchArray(line) {
    const match = stripComment(line).match(arrayRegex)
    if (!match) return null
    return match[2]
      ? { type: match[1], size: parseInt(match[2], 10), name: match[3] }
      : { type: match[1], name: match[3] }
  },

  match(line) {
    const match = stripComment(line).match(fieldRegex)
    if (!match) return null
    return { type: match[1], name: match[2] }
  },

  matchConstant(line) {
    const match = line.match(constantRegex)
    if (!match) return null
    const [, type, name, rest] = match
    // String constants take the rest of the line verbatim, '#' included
    const value = type === 'string' ? rest.trim() : stripComment(rest).trim()
    if (!value) return null
    return { type, name, value }
  },

  isIgnorable(line) {
    return stripComment(line).trim() === ''
  },
}
