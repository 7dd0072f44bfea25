export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key:string]: JsonValue }

export type OperationKind = 'test' | 'remove'

export interface TestOperation {
  readonly op: 'test'
  readonly path: string
  readonly value: JsonValue
}

export interface RemoveOperation {
  readonly op: 'remove'
  readonly path: string
}

/** A single RFC 6902 step. `path` is an RFC 6901 JSON Pointer. */
export type Operation = TestOperation | RemoveOperation

/**
 * Creates a `test` operation without attaching it to a PatchSet, to be passed as the
 * guard of `withRemove()`.
 *
 * @example
 * newPatchSet().withRemove('/status/foo', newTestCondition('/status/condition', 'bar'))
 */
export const newTestCondition = (path:string, value:JsonValue):TestOperation =>
  Object.freeze<TestOperation>({ op: 'test', path, value })

export const newRemove = (path:string):RemoveOperation =>
  Object.freeze<RemoveOperation>({ op: 'remove', path })
