/**
 * Object model types shared by the codec, the stores and the engines.
 *
 * @module core/objects/types
 */

export const OBJECT_TYPES = ['blob', 'tree', 'commit'] as const

export type ObjectType = (typeof OBJECT_TYPES)[number]

/** Entry types a tree may reference */
export type TreeEntryType = Extract<ObjectType, 'blob' | 'tree'>

/**
 * A typed payload as returned by the object store.
 */
export interface StoredObject {
  type: ObjectType
  payload: Uint8Array
}

/**
 * One entry of a tree object. `name` is a single path segment.
 */
export interface TreeEntry {
  type: TreeEntryType
  oid: string
  name: string
}

export interface CommitData {
  /** Root tree of the snapshot */
  tree: string
  /** Zero parents for a root commit, two for a merge */
  parents: string[]
  message: string
}

/**
 * Flattened tree: full relative POSIX path → blob oid.
 */
export type FlatTree = Map<string, string>

export function isObjectType(value: string): value is ObjectType {
  return OBJECT_TYPES.some((type) => type === value)
}

export function isTreeEntryType(value: string): value is TreeEntryType {
  return value === 'blob' || value === 'tree'
}
