/**
 * Object Model
 *
 * - Tree: directory listing codec
 * - Commit: snapshot/history codec
 * - Shared types (ObjectType, TreeEntry, FlatTree)
 */

export { Tree, checkEntryName, sortTreeEntries, parseTreeEntries, serializeTreeEntries } from './tree'
export { Commit, MAX_PARENTS } from './commit'

export { OBJECT_TYPES, isObjectType, isTreeEntryType } from './types'
export type { ObjectType, TreeEntryType, StoredObject, TreeEntry, CommitData, FlatTree } from './types'

export { readCommit, readTree, readBlob, readBlobText, writeBlob, writeTreeObject, writeCommit } from './io'
