/**
 * Shared test assertion utilities
 */

import { NvdlError, type ErrorCode } from '../../core/error-handler'

// Assert helper that throws with descriptive message
export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Assertion failed: ${message}`)
  }
}

// Assert two values are equal
export function assertEqual<T>(actual: T, expected: T, message: string): void {
  if (actual !== expected) {
    throw new Error(`${message}\n  Expected: ${expected}\n  Actual: ${actual}`)
  }
}

// Assert two values serialize to the same JSON
export function assertDeepEqual<T>(
  actual: T,
  expected: T,
  message: string,
): void {
  const actualJson = JSON.stringify(actual)
  const expectedJson = JSON.stringify(expected)
  if (actualJson !== expectedJson) {
    throw new Error(
      `${message}\n  Expected: ${expectedJson}\n  Actual: ${actualJson}`,
    )
  }
}

// Assert an operation fails with an NvdlError carrying the given code
export async function assertRejectsWithCode(
  operation: () => Promise<unknown>,
  code: ErrorCode,
  message: string,
): Promise<NvdlError> {
  try {
    await operation()
  } catch (error) {
    if (!(error instanceof NvdlError)) {
      throw new Error(`${message}\n  Expected NvdlError, got: ${error}`)
    }
    assertEqual(error.code, code, message)
    return error
  }
  throw new Error(`${message}\n  Expected rejection with ${code}`)
}

// Assert a synchronous call throws an NvdlError carrying the given code
export function assertThrowsWithCode(
  operation: () => unknown,
  code: ErrorCode,
  message: string,
): NvdlError {
  try {
    operation()
  } catch (error) {
    if (!(error instanceof NvdlError)) {
      throw new Error(`${message}\n  Expected NvdlError, got: ${error}`)
    }
    assertEqual(error.code, code, message)
    return error
  }
  throw new Error(`${message}\n  Expected ${code} to be thrown`)
}
