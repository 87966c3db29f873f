/**
 * Service lifecycle contract and registry.
 *
 * Provides:
 *  - BaseService interface with initialize/shutdown lifecycle
 *  - ServiceRegistry for registering services and driving their lifecycle
 *
 * All wiring happens in the engine factory; modules receive their
 * collaborators through constructor injection and never import each other's
 * implementations.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for engine services.
 */
export interface BaseService {
  /**
   * Initialize the service — open connections, subscribe to events, start timers.
   * Called after all services are constructed but before the engine emits
   * engine:ready.
   */
  initialize(): Promise<void>

  /**
   * Tear down the service gracefully.
   * Called during engine shutdown in reverse registration order.
   */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Stores named service instances and drives their lifecycle in registration order.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', databaseService)
 * registry.register('orchestrator', orchestrator)
 * await registry.initializeAll()
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []
  private readonly _initialized: string[] = []

  /**
   * Register a named service. Registration order is preserved for lifecycle calls.
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  /**
   * Returns true if a service with the given name is registered.
   */
  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize all registered services in registration order.
   * Fails fast on the first error — later services may depend on
   * already-initialized ones, so continuing after a failure is unsafe.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
        this._initialized.push(name)
      }
    }
  }

  /**
   * Shut down every initialized service in reverse order.
   * Errors are collected and re-thrown as an AggregateError after all services
   * have had a chance to shut down.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    const reversed = [...this._initialized].reverse()
    this._initialized.length = 0

    for (const name of reversed) {
      const service = this._services.get(name)
      if (service !== undefined) {
        try {
          await service.shutdown()
        } catch (err) {
          errors.push(err instanceof Error ? err : new Error(String(err)))
        }
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }

  /** Return names of all registered services in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
