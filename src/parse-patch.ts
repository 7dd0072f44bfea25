import Ajv from 'ajv'
import addFormats from 'ajv-formats'
import { ValidationError } from './handle-patch-error'
import jsonPatchSchema from './json-patch-schema'
import { JsonValue } from './operation'
import { PatchSet, PatchSetOptions } from './patch-set'

type PatchDocument = ({ op: 'test', path: string, value: JsonValue } | { op: 'remove', path: string })[]

const ajv = addFormats(new Ajv())
const validatePatchSchema = ajv.compile<PatchDocument>(jsonPatchSchema)

/**
 * Decodes a JSON Patch document, such as a request body, into a PatchSet. Forbidden
 * paths are not checked here; call `marshal()` on the result for that.
 *
 * @param body JSON text, or the already decoded document
 * @throws SyntaxError if `body` is a string that is not JSON
 * @throws ValidationError if the document is not a patch of `test` and `remove` operations
 *
 * @example
 * app.patch('/things/:id', (req, res) => {
 *   try {
 *     const body = parsePatch(req.body).marshal()
 *     ...
 *   } catch (e) {
 *     handlePatchError(e, res)
 *   }
 * })
 */
export const parsePatch = (body:unknown, options?:PatchSetOptions):PatchSet => {
  const patch:unknown = typeof body == 'string' ? JSON.parse(body) : body
  const patchSet = new PatchSet(options)
  if (patch === null) return patchSet // empty patches marshal as null

  if (!validatePatchSchema(patch)) {
    throw new ValidationError(validatePatchSchema.errors || [])
  }
  patch.forEach(o => {
    if (o.op == 'test') patchSet.withTest(o.path, o.value)
    else patchSet.withRemove(o.path)
  })
  return patchSet
}
