import { Operation } from './operation'
import { ForbiddenPathViolation } from './forbidden-path-error'

/** Paths a client patch must never `test`, e.g. the concurrency token the server checks itself. */
export const DEFAULT_FORBIDDEN_PATHS:ReadonlySet<string> = new Set([
  '/metadata/resourceVersion',
])

/** Always a new set, so a PatchSet never shares its configuration with another. */
export const resolveForbiddenPaths = (paths?:Iterable<string>):ReadonlySet<string> =>
  new Set(paths ?? DEFAULT_FORBIDDEN_PATHS)

export const findForbiddenTests = (operations:readonly Operation[], forbiddenPaths:ReadonlySet<string>) => {
  const violations:ForbiddenPathViolation[] = []
  operations.forEach(({ op, path }, index) => {
    if (op == 'test' && forbiddenPaths.has(path)) {
      violations.push({ index, path })
    }
  })
  return violations
}
