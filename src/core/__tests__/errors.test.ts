import { describe, expect, it } from 'vitest'
import {
  ConfigError,
  ConflictError,
  FatalError,
  InvalidTransitionError,
  NotFoundError,
  RecoveryError,
  RedraftError,
  TransientError,
  ValidationError,
  exitCodeFor,
  httpStatusFor,
} from '../errors.js'

describe('error classes', () => {
  it('build their message and context from the arguments', () => {
    const notFound = new NotFoundError('Job', 'job_9')
    expect(notFound.message).toBe('Job not found: job_9')
    expect(notFound.code).toBe('NOT_FOUND')
    expect(notFound.context).toEqual({ resource: 'Job', id: 'job_9' })
    expect(notFound).toBeInstanceOf(RedraftError)

    const transition = new InvalidTransitionError('completed', 'cancel', 'job already finished')
    expect(transition.message).toBe('Invalid transition "cancel" from status "completed": job already finished')
    expect(transition.name).toBe('InvalidTransitionError')
  })

  it('serialise with code and context', () => {
    const json = new ConflictError('Sequence 3 already taken', { sequence: 3 }).toJSON()
    expect(json).toMatchObject({
      name: 'ConflictError',
      message: 'Sequence 3 already taken',
      code: 'CONFLICT',
      context: { sequence: 3 },
    })
  })
})

describe('httpStatusFor', () => {
  it('maps each error kind to a status', () => {
    expect(httpStatusFor(new ValidationError('bad'))).toBe(400)
    expect(httpStatusFor(new NotFoundError('Job', 'x'))).toBe(404)
    expect(httpStatusFor(new ConflictError('race'))).toBe(409)
    expect(httpStatusFor(new InvalidTransitionError('failed', 'start', 'no'))).toBe(409)
    expect(httpStatusFor(new TransientError('later'))).toBe(503)
    expect(httpStatusFor(new FatalError('never'))).toBe(500)
    expect(httpStatusFor(new ConfigError('cfg'))).toBe(500)
    expect(httpStatusFor(new RecoveryError('rec'))).toBe(500)
    expect(httpStatusFor(new Error('plain'))).toBe(500)
  })
})

describe('exitCodeFor', () => {
  it('uses 2 for usage errors and 1 otherwise', () => {
    expect(exitCodeFor(new ValidationError('bad'))).toBe(2)
    expect(exitCodeFor(new NotFoundError('Job', 'x'))).toBe(2)
    expect(exitCodeFor(new InvalidTransitionError('completed', 'cancel', 'done'))).toBe(1)
    expect(exitCodeFor('not even an error')).toBe(1)
  })
})
