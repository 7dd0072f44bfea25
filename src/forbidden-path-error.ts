export interface ForbiddenPathViolation {
  readonly index: number
  readonly path: string
}

export const formatViolation = ({ index, path }:ForbiddenPathViolation) =>
  `test operation at index: ${index} contains forbidden path: ${JSON.stringify(path)}`

/** One violation reads as its own message, several as a bracketed list. */
export const formatViolations = (violations:readonly ForbiddenPathViolation[]) => {
  const messages = violations.map(formatViolation)
  if (messages.length == 1) return messages[0]
  return `[${messages.join(', ')}]`
}

/** Thrown by `PatchSet.marshal()` with every forbidden `test` operation it found. */
export class ForbiddenPathError extends Error {
  readonly violations: readonly ForbiddenPathViolation[]

  constructor(violations:readonly ForbiddenPathViolation[]) {
    super(formatViolations(violations))
    this.name = 'ForbiddenPathError'
    this.violations = Object.freeze([...violations])
  }
}
