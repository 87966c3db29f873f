import { randomUUID } from 'node:crypto'
import type { Clock, IdGenerator } from './types.js'

export const systemClock: Clock = {
  now: () => new Date(),
}

export const uuidGenerator: IdGenerator = {
  next: (prefix: string) => `${prefix}_${randomUUID()}`,
}

/**
 * Clock that only moves when told to. Each `now()` call advances by `stepMs`
 * so consecutive writes get distinct, ordered timestamps.
 */
export class ManualClock implements Clock {
  private _current: number

  constructor(
    start: Date | string = '2024-01-01T00:00:00.000Z',
    private readonly _stepMs = 0,
  ) {
    this._current = new Date(start).getTime()
  }

  now(): Date {
    const value = new Date(this._current)
    this._current += this._stepMs
    return value
  }

  advance(ms: number): void {
    this._current += ms
  }

  set(value: Date | string): void {
    this._current = new Date(value).getTime()
  }
}

/** Deterministic ids: `${prefix}_1`, `${prefix}_2`, … per prefix */
export class SequentialIdGenerator implements IdGenerator {
  private readonly _counters = new Map<string, number>()

  next(prefix: string): string {
    const value = (this._counters.get(prefix) ?? 0) + 1
    this._counters.set(prefix, value)
    return `${prefix}_${String(value)}`
  }
}
