/**
 * Component lifecycle registry.
 *
 * Provides:
 *  - Component interface with initialize/shutdown lifecycle
 *  - ComponentRegistry for ordered startup and reverse-order teardown
 *
 * The supervisor daemon registers its long-lived collaborators here (state
 * database, state recorder, control signal poller) so that they come up
 * before any service starts and go down after every service has stopped.
 */

// ---------------------------------------------------------------------------
// Component interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for daemon components.
 */
export interface Component {
  /** Open connections, subscribe to events, start timers */
  initialize(): Promise<void>

  /** Release everything initialize() acquired */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ComponentRegistry
// ---------------------------------------------------------------------------

/**
 * Named components, initialized in registration order and shut down in
 * reverse.
 *
 * @example
 * const components = new ComponentRegistry()
 * components.register('database', databaseService)
 * components.register('recorder', stateRecorder)
 * await components.initializeAll()
 * ...
 * await components.shutdownAll()
 */
export class ComponentRegistry {
  private readonly _components = new Map<string, Component>()
  private readonly _order: string[] = []
  private readonly _initialized: string[] = []

  /**
   * @throws {Error} if a component with the same name is already registered.
   */
  register(name: string, component: Component): void {
    if (this._components.has(name)) {
      throw new Error(`Component "${name}" is already registered`)
    }
    this._components.set(name, component)
    this._order.push(name)
  }

  has(name: string): boolean {
    return this._components.has(name)
  }

  /**
   * Initialize in registration order. Fails fast: later components may rely
   * on earlier ones.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      if (this._initialized.includes(name)) continue
      const component = this._components.get(name)
      if (component === undefined) continue
      await component.initialize()
      this._initialized.push(name)
    }
  }

  /**
   * Shut down every initialized component in reverse order. Errors are
   * collected and rethrown as an AggregateError once all have been tried.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []

    for (const name of [...this._initialized].reverse()) {
      const component = this._components.get(name)
      if (component === undefined) continue
      try {
        await component.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }
    this._initialized.length = 0

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} component(s)`)
    }
  }

  /** Names in registration order */
  get names(): string[] {
    return [...this._order]
  }
}
