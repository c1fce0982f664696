/**
 * Test Names
 */

import type { TestIdentity } from '../provider'

/**
 * Parameterized runs append an index or label in brackets, e.g. `addsVertex[memory]`.
 * Strip it so every parameterization maps to the same declared test.
 */
export function normalizeTestName(name: string): string {
  if (!name.endsWith(']')) return name
  const start = name.indexOf('[')
  return start === -1 ? name : name.slice(0, start).trimEnd()
}

const encoder = new TextEncoder()

function encodeNamePart(part: string): string {
  let encoded = ''
  for (const byte of encoder.encode(part)) {
    const char = String.fromCharCode(byte)
    encoded += /[A-Za-z0-9]/.test(char) ? char : `_${byte.toString(16).padStart(2, '0')}`
  }
  return encoded
}

/**
 * File-safe graph name for a test identity.
 *
 * Letters and digits are kept; every other UTF-8 byte becomes `_` and two hex
 * digits, and the parts are joined with `-`. Distinct identities never share
 * a name.
 */
export function graphNameFor(identity: TestIdentity): string {
  return `${encodeNamePart(identity.suite)}-${encodeNamePart(identity.test)}`
}
