/**
 * Error type for malformed calculator input.
 *
 * Thrown by the energy library; the UI catches only this class and shows
 * the message next to the form that produced it.
 */

export type InvalidArgumentCode =
  | 'LENGTH_MISMATCH'
  | 'TOO_FEW_SAMPLES'
  | 'MISSING_GEOMETRY'

export class InvalidArgumentError extends Error {
  readonly code: InvalidArgumentCode

  constructor(code: InvalidArgumentCode, message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
    this.code = code
  }
}
