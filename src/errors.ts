// Raised when a caller breaks an input contract, e.g. bounds of no points.
// Numeric degeneracy (no roots, zero leading terms) is never an error.
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PreconditionError'
  }
}
