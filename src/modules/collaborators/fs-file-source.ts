/**
 * FsFileSource — originals read from files under a root directory.
 *
 * A file id is a path relative to the root. Ids that resolve outside the root
 * are rejected.
 */

import { readFile } from 'node:fs/promises'
import { isAbsolute, relative, resolve } from 'node:path'
import { NotFoundError, ValidationError } from '../../core/errors.js'
import type { FileId } from '../../core/types.js'
import type { FileSource } from './types.js'

export class FsFileSource implements FileSource {
  private readonly _root: string

  constructor(rootDir: string) {
    this._root = resolve(rootDir)
  }

  get rootDir(): string {
    return this._root
  }

  /** Absolute path of `fileId` under the root */
  resolvePath(fileId: FileId): string {
    const path = resolve(this._root, fileId)
    const rel = relative(this._root, path)
    if (fileId === '' || rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new ValidationError(`File id must name a file under ${this._root}: ${fileId}`, { fileId })
    }
    return path
  }

  async fetchOriginal(fileId: FileId): Promise<string> {
    const path = this.resolvePath(fileId)
    try {
      return await readFile(path, 'utf-8')
    } catch (err) {
      if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
        throw new NotFoundError('File', fileId, { path })
      }
      throw err
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err
}
