/**
 * Validation failures raised by the matrix mapper.
 *
 * Every error carries a `kind` tag so callers can switch on it without
 * chaining instanceof checks. All of them are thrown before a buffer is
 * touched.
 */

export type MatrixErrorKind = 'shape-mismatch' | 'size-mismatch' | 'parse' | 'range'

/** A shaped grid has the wrong row count or a row of the wrong width. */
export class ShapeMismatchError extends Error {
  readonly kind = 'shape-mismatch' as const

  constructor(message: string) {
    super(message)
    this.name = 'ShapeMismatchError'
  }
}

/** A flat buffer (or its string form) is not exactly 625 cells. */
export class SizeMismatchError extends Error {
  readonly kind = 'size-mismatch' as const

  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(`Flat buffer must have exactly ${expected} cells, got ${actual}`)
    this.name = 'SizeMismatchError'
  }
}

/** A pixel string has a non-integer token or the wrong token count. */
export class ParseError extends Error {
  readonly kind = 'parse' as const

  constructor(
    message: string,
    /** Zero-based index of the offending token, when one is to blame. */
    readonly tokenIndex: number | null = null,
  ) {
    super(message)
    this.name = 'ParseError'
  }
}

/** A row index outside [0, 24]. */
export class RowRangeError extends RangeError {
  readonly kind = 'range' as const

  constructor(readonly row: number) {
    super(`Row must be between 0 and 24, got ${row}`)
    this.name = 'RowRangeError'
  }
}

export type MatrixError =
  | ShapeMismatchError
  | SizeMismatchError
  | ParseError
  | RowRangeError

export function isMatrixError(err: unknown): err is MatrixError {
  return (
    err instanceof ShapeMismatchError ||
    err instanceof SizeMismatchError ||
    err instanceof ParseError ||
    err instanceof RowRangeError
  )
}
