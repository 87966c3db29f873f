/**
 * CLI output formatting utilities
 *
 * Human-readable tables for job listings, plus the JSON envelope every
 * `--output-format json` command writes (one object per line).
 */

import type { Job } from '../../core/types.js'

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(value: string): OutputFormat {
  return value === 'json' ? 'json' : 'human'
}

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by key)
 * @param keys    - Object keys to read from each row (in column order)
 */
export function formatTable(headers: string[], rows: Record<string, string>[], keys: string[]): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => Math.max(max, (row[key] ?? '').length), 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys
      .map((key, i) => {
        const val = row[key] ?? ''
        return val.padEnd(widths[i] ?? val.length)
      })
      .join(' | ')
      .trimEnd(),
  )

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n')
}

export function formatJobTable(jobs: Job[]): string {
  const headers = ['ID', 'Status', 'Pass', 'File', 'Model', 'Created']
  const keys = ['id', 'status', 'pass', 'file', 'model', 'created']
  const rows = jobs.map((job) => ({
    id: job.id,
    status: job.status,
    pass: `${String(job.currentPass)}/${String(job.totalPasses)}`,
    file: job.fileName,
    model: job.model,
    created: job.createdAt,
  }))
  return formatTable(headers, rows, keys)
}

/**
 * Envelope for machine-consumable output.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the line was written */
  timestamp: string
  version: string
  /** The CLI command that produced the line */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}

/** One NDJSON line, newline included */
export function jsonLine<T>(command: string, data: T, version: string): string {
  return JSON.stringify(buildJsonOutput(command, data, version)) + '\n'
}
