/**
 * Human-readable rendering of jobs, events and diffs.
 */

import type { Job, JobEvent } from '../../core/types.js'
import type { StreamItem } from '../../modules/broadcaster/types.js'
import type { Diff, DiffChange } from '../../modules/diff-engine/types.js'
import type { RecoveryResult } from '../../recovery/crash-recovery.js'

/**
 * Multi-line job report:
 *
 *   Job job_1  Status: completed  Pass: 2/2
 *   File:    doc-1.md (doc-1)
 *   Model:   test-model
 *   Created: 2024-06-01T12:00:00.000Z
 */
export function renderJobHuman(job: Job): string {
  const lines = [
    `Job ${job.id}  Status: ${job.status}  Pass: ${String(job.currentPass)}/${String(job.totalPasses)}`,
    `File:    ${job.fileName} (${job.fileId})`,
    `Model:   ${job.model}`,
    `Created: ${job.createdAt}`,
  ]
  if (job.completedAt !== null) lines.push(`Ended:   ${job.completedAt}`)
  if (job.errorMessage !== null) lines.push(`Error:   ${job.errorMessage}`)
  return lines.join('\n')
}

/** `#3 pass_completed [pass 1] Pass 1 completed` */
export function renderEventLine(event: JobEvent): string {
  const pass = event.passNumber === null ? '' : ` [pass ${String(event.passNumber)}]`
  return `#${String(event.sequence)} ${event.eventType}${pass} ${event.message}`
}

export function renderStreamItem(item: StreamItem): string {
  if (item.type === 'event') return renderEventLine(item.event)
  return `! fell behind after #${String(item.lastSequence)}; re-attach with --since ${String(item.lastSequence)}`
}

const CHANGE_PREFIX: Record<DiffChange['kind'], string> = {
  unchanged: ' ',
  added: '+',
  removed: '-',
  modified: '~',
}

function indentBlock(prefix: string, text: string): string[] {
  return text.split('\n').map((line) => `${prefix} ${line}`.trimEnd())
}

/**
 * Unified-style listing, one block per aligned unit. Modified units show the
 * old text under `~` then the new text under `>`.
 */
export function renderDiffHuman(diff: Diff): string {
  const { stats } = diff
  const lines = [
    `Diff ${diff.fileId}: pass ${String(diff.fromPass)} -> pass ${String(diff.toPass)} (${diff.granularity})`,
    `unchanged=${String(stats.unchanged)} added=${String(stats.added)} removed=${String(stats.removed)} modified=${String(stats.modified)}`,
  ]
  if (!diff.aligned) lines.push('(too large to align; middle section shown as replaced)')
  lines.push('')

  for (const change of diff.changes) {
    const prefix = CHANGE_PREFIX[change.kind]
    if (change.kind === 'modified') {
      lines.push(...indentBlock(prefix, change.before ?? ''))
      lines.push(...indentBlock('>', change.after ?? ''))
    } else {
      lines.push(...indentBlock(prefix, change.after ?? change.before ?? ''))
    }
  }
  return lines.join('\n')
}

export function renderRecoveryHuman(result: RecoveryResult): string {
  const lines = [
    `Recovery: resumed=${String(result.resumed)} requeued=${String(result.requeued)} failed=${String(result.failed)} skipped=${String(result.skipped)}`,
  ]
  for (const action of result.actions) {
    lines.push(`  ${action.jobId}  ${action.action}  ${action.reason}`)
  }
  return lines.join('\n')
}
