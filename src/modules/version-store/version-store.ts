/**
 * VersionStore — append-only content snapshots keyed by (fileId, passNumber).
 *
 * Pass 0 is the original content. A snapshot is immutable; the only way to
 * change one is `replaceVersion`, which keeps the superseded content in an
 * audit trail.
 */

import type { FileId, JobId, Version } from '../../core/types.js'

export interface ReplaceVersionOptions {
  reason: string
  jobId?: JobId | null
}

export interface VersionSupersession {
  fileId: FileId
  passNumber: number
  previousContent: string
  previousCreatedAt: string
  replacedAt: string
  reason: string
  jobId: JobId | null
}

export interface VersionStore {
  /** @throws {ConflictError} when a snapshot already exists for the pair */
  putVersion(fileId: FileId, passNumber: number, content: string): Version

  /** @throws {NotFoundError} */
  getVersion(fileId: FileId, passNumber: number): string

  /** @throws {NotFoundError} */
  getVersionRecord(fileId: FileId, passNumber: number): Version

  hasVersion(fileId: FileId, passNumber: number): boolean

  /** Stored pass numbers, ascending */
  listPasses(fileId: FileId): number[]

  /** @throws {NotFoundError} when there is nothing to replace */
  replaceVersion(fileId: FileId, passNumber: number, content: string, options: ReplaceVersionOptions): Version

  listSupersessions(fileId: FileId): VersionSupersession[]
}
