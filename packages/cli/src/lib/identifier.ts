import { InvalidDataTypeError, InvalidMessageTypeError } from '@msgdef/shared'
import type { Result } from '@msgdef/shared'

export const HEADER_TYPE = 'Header'
export const DEFAULT_BASE_PACKAGE = 'std_msgs'

export interface TypeIdentifier {
  package: string
  localType: string
}

/**
 * Split "package/LocalType" at the first separator. A bare "Header" belongs
 * to the base package; any other bare name is rejected.
 */
export function parseTypeIdentifier(
  typeId: string,
  basePackage: string = DEFAULT_BASE_PACKAGE
): Result<TypeIdentifier, InvalidMessageTypeError | InvalidDataTypeError> {
  let pkg = ''
  let localType = typeId

  const separator = typeId.indexOf('/')
  if (separator > 0) {
    pkg = typeId.substring(0, separator)
    localType = typeId.substring(separator + 1)
  }

  if (!pkg) {
    if (localType !== HEADER_TYPE) {
      return { ok: false, error: new InvalidMessageTypeError(typeId) }
    }
    pkg = basePackage
  }

  if (!localType) {
    return { ok: false, error: new InvalidDataTypeError() }
  }

  return { ok: true, value: { package: pkg, localType } }
}

/**
 * Member types written as a bare "Header" refer to the base package's header.
 */
export function qualifyMemberType(memberType: string, basePackage: string = DEFAULT_BASE_PACKAGE): string {
  return memberType === HEADER_TYPE ? `${basePackage}/${HEADER_TYPE}` : memberType
}
