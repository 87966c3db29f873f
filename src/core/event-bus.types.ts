/**
 * EngineEvents interface — defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "job:event", "job:queued")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { JobEvent, JobId, JobStatus } from './types.js'

/**
 * Complete typed map of all events emitted on the engine event bus.
 * Use `keyof EngineEvents` to constrain event keys.
 */
export interface EngineEvents {
  // -------------------------------------------------------------------------
  // Job lifecycle events
  // -------------------------------------------------------------------------

  /** A job event has been durably appended and may now be observed */
  'job:event': { event: JobEvent }

  /** A job was created and is waiting for an admission slot */
  'job:queued': { jobId: JobId; position: number }

  /** The orchestrator claimed a job and is driving its passes */
  'job:claimed': { jobId: JobId; resumed: boolean }

  /** A job reached a terminal status */
  'job:terminal': { jobId: JobId; status: JobStatus }

  // -------------------------------------------------------------------------
  // Broadcast events
  // -------------------------------------------------------------------------

  /** A subscriber fell behind and its live feed was dropped */
  'subscriber:overflow': { jobId: JobId; subscriptionId: string; lastSequence: number }

  // -------------------------------------------------------------------------
  // Engine lifecycle events
  // -------------------------------------------------------------------------

  /** Engine has finished initialization and is accepting jobs */
  'engine:ready': Record<string, never>

  /** Engine is shutting down */
  'engine:shutdown': { reason: string }
}
