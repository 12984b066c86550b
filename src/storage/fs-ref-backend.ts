/**
 * @fileoverview Filesystem ref backend.
 *
 * Ref names map onto paths below the repository directory: `HEAD` and
 * `MERGE_HEAD` are flat files, everything else lives under `refs/`. A file
 * holds either `ref: <name>` (symbolic) or an oid (direct).
 *
 * @module storage/fs-ref-backend
 */

import type { Dirent } from 'fs'
import * as fs from 'fs/promises'
import * as path from 'path'
import type { RefBackend, RefValue } from '../types/storage'
import { isErrnoCode } from './fs-errors'
import { SPECIAL_REFS, parseRefFile, serializeRefFile } from './ref-format'

export class FileRefBackend implements RefBackend {
  constructor(readonly gitDir: string) {}

  private refPath(name: string): string {
    return path.join(this.gitDir, ...name.split('/'))
  }

  async read(name: string): Promise<RefValue | undefined> {
    let content: string
    try {
      content = await fs.readFile(this.refPath(name), 'utf8')
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'EISDIR')) return undefined
      throw error
    }
    return parseRefFile(content)
  }

  async write(name: string, value: RefValue): Promise<void> {
    const file = this.refPath(name)
    await fs.mkdir(path.dirname(file), { recursive: true })
    await fs.writeFile(file, serializeRefFile(value))
  }

  async remove(name: string): Promise<boolean> {
    try {
      await fs.unlink(this.refPath(name))
      return true
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return false
      throw error
    }
  }

  async listNames(): Promise<string[]> {
    const names: string[] = []
    for (const special of SPECIAL_REFS) {
      if ((await this.read(special)) !== undefined) {
        names.push(special)
      }
    }
    const refs: string[] = []
    await this.walk(path.join(this.gitDir, 'refs'), 'refs', refs)
    return [...names, ...refs.sort()]
  }

  private async walk(dir: string, prefix: string, out: string[]): Promise<void> {
    let entries: Dirent[]
    try {
      entries = await fs.readdir(dir, { withFileTypes: true })
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return
      throw error
    }
    for (const entry of entries) {
      const name = `${prefix}/${entry.name}`
      if (entry.isDirectory()) {
        await this.walk(path.join(dir, entry.name), name, out)
      } else if (entry.isFile()) {
        out.push(name)
      }
    }
  }
}
