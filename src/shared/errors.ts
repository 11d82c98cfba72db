import type { ZodIssue } from 'zod'

/**
 * Raised by `removeAt` when the position is not an integer in `[0, size)`.
 * The collection is left untouched.
 */
export class IndexOutOfRangeError extends RangeError {
  readonly index: number
  readonly size: number

  constructor(index: number, size: number) {
    super(`Index out of range: ${index} (size ${size})`)
    this.name = 'IndexOutOfRangeError'
    this.index = index
    this.size = size
  }
}

/**
 * Raised by `add` when the value is not a record of the collection's kind.
 */
export class RecordTypeError extends TypeError {
  readonly expectedKind: string

  constructor(expectedKind: string) {
    super(`add expects a record of kind "${expectedKind}"`)
    this.name = 'RecordTypeError'
    this.expectedKind = expectedKind
  }
}

/**
 * Raised when record input cannot be coerced (e.g. a non-numeric amount).
 */
export class RecordValidationError extends TypeError {
  readonly issues: ZodIssue[]

  constructor(kind: string, issues: ZodIssue[]) {
    const fields = issues.map((issue) => issue.path.join('.') || '(root)').join(', ')
    super(`Invalid ${kind} input: ${fields}`)
    this.name = 'RecordValidationError'
    this.issues = issues
  }
}

export class DuplicateProductError extends Error {
  readonly productName: string

  constructor(productName: string) {
    super(`Product already exists: ${productName}`)
    this.name = 'DuplicateProductError'
    this.productName = productName
  }
}

/**
 * Errors the interactive shells report and recover from.
 */
export const isRecoverableError = (
  err: unknown
): err is IndexOutOfRangeError | RecordTypeError | RecordValidationError | DuplicateProductError =>
  err instanceof IndexOutOfRangeError ||
  err instanceof RecordTypeError ||
  err instanceof RecordValidationError ||
  err instanceof DuplicateProductError
