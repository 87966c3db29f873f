/**
 * Public API for the recovery module.
 */

export {
  CrashRecoveryManager,
  type RecoveryResult,
  type RecoveryAction,
  type CrashRecoveryManagerOptions,
} from './crash-recovery.js'

export { IntervalWatchdog, type StaleJobWatchdog, type IntervalWatchdogOptions } from './watchdog.js'
