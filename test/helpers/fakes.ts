/**
 * In-process stand-ins for the engine's external collaborators.
 */

import { NotFoundError } from '../../src/core/errors.js'
import type { FileSource, RefinementCollaborator, RunPassRequest } from '../../src/modules/collaborators/types.js'

export type RunPassHandler = (request: RunPassRequest, call: number) => Promise<string> | string

/** Appends a marker line per pass unless a handler is supplied */
export class FakeRefiner implements RefinementCollaborator {
  readonly calls: RunPassRequest[] = []
  private _inFlight = 0
  maxInFlight = 0

  constructor(private _handler: RunPassHandler = (request) => `${request.content}\n[pass ${String(request.passNumber)}]`) {}

  setHandler(handler: RunPassHandler): void {
    this._handler = handler
  }

  async runPass(request: RunPassRequest): Promise<string> {
    this.calls.push(request)
    this._inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this._inFlight)
    try {
      return await this._handler(request, this.calls.length)
    } finally {
      this._inFlight--
    }
  }
}

export class FakeFileSource implements FileSource {
  private readonly _files = new Map<string, string>()

  constructor(files: Record<string, string> = {}) {
    for (const [fileId, content] of Object.entries(files)) this._files.set(fileId, content)
  }

  set(fileId: string, content: string): void {
    this._files.set(fileId, content)
  }

  async fetchOriginal(fileId: string): Promise<string> {
    const content = this._files.get(fileId)
    if (content === undefined) throw new NotFoundError('File', fileId)
    return content
  }
}

/** A promise plus the function that resolves it */
export interface Gate {
  promise: Promise<void>
  open(): void
}

export function createGate(): Gate {
  let open: () => void = () => undefined
  const promise = new Promise<void>((resolve) => {
    open = resolve
  })
  return { promise, open: () => open() }
}

/** Let pending microtasks and I/O callbacks run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
