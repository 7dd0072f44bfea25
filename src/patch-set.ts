import { JsonValue, Operation, TestOperation, newRemove, newTestCondition } from './operation'
import { ForbiddenPathError } from './forbidden-path-error'
import { findForbiddenTests, resolveForbiddenPaths } from './forbidden-paths'

export interface PatchSetOptions {
  /** JSON Pointers no `test` operation may target. Uses DEFAULT_FORBIDDEN_PATHS if unset. */
  forbiddenPaths?: Iterable<string>
}

/**
 * An ordered, append-only list of JSON Patch operations. The append methods mutate the
 * receiver and return it for chaining; nothing is checked until `marshal()`.
 *
 * A PatchSet is meant to be built up by one caller and then marshaled. It is not safe
 * to share while it is still being appended to.
 *
 * @example
 * const body = newPatchSet()
 *   .withRemove('/status/foo', newTestCondition('/status/condition', 'bar'))
 *   .marshal()
 * // [{"op":"test","path":"/status/condition","value":"bar"},{"op":"remove","path":"/status/foo"}]
 */
export class PatchSet {
  readonly forbiddenPaths:ReadonlySet<string>
  private readonly ops:Operation[] = []

  constructor(options:PatchSetOptions={}) {
    this.forbiddenPaths = resolveForbiddenPaths(options.forbiddenPaths)
  }

  /** A copy of the operations in application order. */
  get operations():readonly Operation[] {
    return [...this.ops]
  }

  /**
   * Appends a `test` of `value` at `path`. Non-finite numbers have no JSON form and are
   * encoded as `null`, as `JSON.stringify` does.
   */
  withTest(path:string, value:JsonValue):this {
    this.ops.push(newTestCondition(path, value))
    return this
  }

  /**
   * Appends a `remove` of `path`, preceded by `condition` when one is given. The
   * condition may test a different field than the one removed. The condition is
   * copied, so changing it afterwards does not change the patch.
   */
  withRemove(path:string, condition?:TestOperation):this {
    if (condition) this.ops.push(newTestCondition(condition.path, condition.value))
    this.ops.push(newRemove(path))
    return this
  }

  isEmpty():boolean {
    return this.ops.length == 0
  }

  /**
   * Encodes the patch as JSON. An empty patch encodes as `null`.
   *
   * @throws ForbiddenPathError listing every `test` operation on a forbidden path.
   */
  marshal():string {
    const violations = findForbiddenTests(this.ops, this.forbiddenPaths)
    if (violations.length) throw new ForbiddenPathError(violations)

    if (this.isEmpty()) return JSON.stringify(null)
    // rebuilt so keys are always emitted as op, path, value
    return JSON.stringify(this.ops.map(o => o.op == 'test'
      ? { op: o.op, path: o.path, value: o.value }
      : { op: o.op, path: o.path }))
  }
}

export const newPatchSet = (options?:PatchSetOptions) => new PatchSet(options)

/**
 * Concatenates the operations of each set, in argument order, into a new PatchSet.
 * The inputs are left untouched. The result forbids every path any input forbids.
 */
export const merge = (...sets:PatchSet[]):PatchSet => {
  if (!sets.length) return new PatchSet()
  const forbiddenPaths = sets.flatMap(s => [...s.forbiddenPaths])
  const merged = new PatchSet({ forbiddenPaths })
  sets.forEach(s => {
    s.operations.forEach(o => {
      if (o.op == 'test') merged.withTest(o.path, o.value)
      else merged.withRemove(o.path)
    })
  })
  return merged
}
