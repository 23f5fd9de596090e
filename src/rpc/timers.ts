import { noTimerDriver } from './protocol.js'

/** A pending callback. Cancelling is idempotent. */
export interface TimerHandle {
  cancel(): void
}

/**
 * Backend that can run a callback after a delay.
 * Lets the RPC layer schedule work with or without an HTTP event loop present.
 */
export interface TimerDriver {
  name(): string
  newTimer(callback: () => void, delayMillis: number): TimerHandle
}

export class TimerDriverConflictError extends Error {
  constructor(current: string, attempted: string) {
    super(`Timer driver "${current}" already registered; unregister it before registering "${attempted}"`)
    this.name = 'TimerDriverConflictError'
  }
}

/**
 * Named deferred callbacks on top of whichever driver is registered.
 * At most one callback is pending per name.
 */
export class TimerScheduler {
  private driver: TimerDriver | null = null
  private timers = new Map<string, TimerHandle>()

  registerDriver(driver: TimerDriver): void {
    if (this.driver === driver) return
    if (this.driver) {
      throw new TimerDriverConflictError(this.driver.name(), driver.name())
    }
    this.driver = driver
    console.log(`[timers] Registered timer driver "${driver.name()}"`)
  }

  /** Remove the driver if it is the registered one. */
  unregisterDriver(driver: TimerDriver): boolean {
    if (this.driver !== driver) return false
    this.driver = null
    return true
  }

  get driverName(): string | null {
    return this.driver ? this.driver.name() : null
  }

  /**
   * Run `callback` in `delaySeconds`, replacing any callback pending under `name`.
   * Throws NoTimerDriver when no driver is registered.
   */
  runLater(name: string, callback: () => void, delaySeconds: number): void {
    const driver = this.driver
    if (!driver) throw noTimerDriver()

    this.cancel(name)

    // A driver may fire synchronously from inside newTimer
    let handle: TimerHandle | undefined
    let fired = false

    const created = driver.newTimer(() => {
      fired = true
      if (handle && this.timers.get(name) === handle) this.timers.delete(name)
      try {
        callback()
      } catch (err) {
        console.error(`[timers] Callback "${name}" failed:`, err)
      }
    }, delaySeconds * 1000)

    handle = created
    if (!fired) this.timers.set(name, created)
  }

  cancel(name: string): boolean {
    const existing = this.timers.get(name)
    if (!existing) return false
    this.timers.delete(name)
    existing.cancel()
    return true
  }

  has(name: string): boolean {
    return this.timers.has(name)
  }

  /** Cancel every pending named timer. */
  clear(): void {
    for (const handle of this.timers.values()) {
      handle.cancel()
    }
    this.timers.clear()
  }

  get pendingCount(): number {
    return this.timers.size
  }
}
