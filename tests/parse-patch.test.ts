import { ForbiddenPathError } from '../src/forbidden-path-error'
import { ValidationError } from '../src/handle-patch-error'
import { newTestCondition } from '../src/operation'
import { parsePatch } from '../src/parse-patch'
import { newPatchSet } from '../src/patch-set'

describe('parse-patch', () => {
  it('should read back a marshaled patch', () => {
    const patch = newPatchSet()
      .withTest('/status/secondCondition', {ready: true})
      .withRemove('/status/foo', newTestCondition('/status/condition', 'bar'))
    const body = patch.marshal()
    const parsed = parsePatch(body)
    expect(parsed.operations).toEqual(patch.operations)
    expect(parsed.marshal()).toBe(body)
  })

  it('should accept an already decoded body', () => {
    const parsed = parsePatch([{op: 'remove', path: '/status/foo'}])
    expect(parsed.marshal()).toBe('[{"op":"remove","path":"/status/foo"}]')
  })

  it('should read null as an empty patch', () => {
    expect(parsePatch('null').isEmpty()).toBe(true)
    expect(parsePatch(null).marshal()).toBe('null')
  })

  it('should read an empty array as an empty patch', () => {
    expect(parsePatch('[]').marshal()).toBe('null')
  })

  it('should throw a SyntaxError for malformed JSON', () => {
    expect(() => parsePatch('[{"op":')).toThrow(SyntaxError)
  })

  it('should reject operations other than test and remove', () => {
    expect(() => parsePatch('[{"op":"add","path":"/a","value":1}]')).toThrow(ValidationError)
  })

  it('should reject a test without a value', () => {
    expect(() => parsePatch([{op: 'test', path: '/a'}])).toThrow(ValidationError)
  })

  it('should reject a path that is not a JSON Pointer', () => {
    expect(() => parsePatch([{op: 'remove', path: 'status/foo'}])).toThrow(ValidationError)
  })

  it('should reject a document that is not an array', () => {
    expect(() => parsePatch({op: 'remove', path: '/a'})).toThrow(ValidationError)
  })

  it('should leave forbidden paths to marshal', () => {
    const parsed = parsePatch('[{"op":"test","path":"/metadata/resourceVersion","value":"9"}]')
    expect(parsed.isEmpty()).toBe(false)
    expect(() => parsed.marshal()).toThrow(ForbiddenPathError)
  })

  it('should pass options to the patch set', () => {
    const parsed = parsePatch('[{"op":"test","path":"/spec/owner","value":"x"}]', {forbiddenPaths: ['/spec/owner']})
    expect(() => parsed.marshal())
      .toThrow('test operation at index: 0 contains forbidden path: "/spec/owner"')
  })
})
