/**
 * Storage backends.
 *
 * @module storage
 */

export { FileObjectStore } from './fs-object-store'
export { FileRefBackend } from './fs-ref-backend'
export { MemoryObjectStore, MemoryRefBackend } from './memory'
export { encodeLooseObject, decodeLooseObject, verifyLooseObject } from './loose-object'
export { parseRefFile, serializeRefFile, SPECIAL_REFS } from './ref-format'
