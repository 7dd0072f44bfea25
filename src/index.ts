export * from './operation'
export * from './forbidden-path-error'
export * from './forbidden-paths'
export * from './patch-set'
export { parsePatch } from './parse-patch'
export { handlePatchError, ValidationError } from './handle-patch-error'
export { default as jsonPatchSchema } from './json-patch-schema'
