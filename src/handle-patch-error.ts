import { ValidationError } from 'ajv'
import { Response } from 'express'
import { ForbiddenPathError } from './forbidden-path-error'

export { ValidationError }

/** Handles sending a 400 Bad Request response when catching an error from parsePatch() or marshal(). */
export const handlePatchError = (e:unknown, res:Response) => {
  if (e instanceof ForbiddenPathError) {
    console.warn('Rejected JSON Patch.', e.message)
    return res.status(400).send({error: 'Forbidden test path in patch', violations: e.violations})
  }
  if (e instanceof SyntaxError) {
    // probably a JSON.parse error
    return res.status(400).send({error: 'Invalid JSON payload', jsonParseError: e.message})
  }
  if (e instanceof ValidationError) {
    // at least one schema validation error encountered
    return res.status(400).send({error: 'Invalid payload', validationErrors: e.errors})
  }
  throw (e)
}
