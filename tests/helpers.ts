import type { TimerDriver, TimerHandle } from '../src/rpc/timers.js'
import type { RpcCommand, RpcHandler } from '../src/rpc/types.js'

interface FakeTimer {
  callback: () => void
  delayMillis: number
  cancelled: boolean
  fired: boolean
}

/** Timer driver whose timers only fire when the test says so. */
export class FakeTimerDriver implements TimerDriver {
  readonly timers: FakeTimer[] = []

  constructor(private readonly driverName = 'Fake') {}

  name(): string {
    return this.driverName
  }

  newTimer(callback: () => void, delayMillis: number): TimerHandle {
    const timer: FakeTimer = { callback, delayMillis, cancelled: false, fired: false }
    this.timers.push(timer)
    return {
      cancel() {
        timer.cancelled = true
      },
    }
  }

  /** Fire every live timer once. */
  fireAll(): void {
    for (const timer of [...this.timers]) {
      if (timer.cancelled || timer.fired) continue
      timer.fired = true
      timer.callback()
    }
  }

  get liveCount(): number {
    return this.timers.filter((t) => !t.cancelled && !t.fired).length
  }
}

/** Command whose handler counts calls and echoes its params. */
export function countingCommand(
  name: string,
  options: { category?: string; okSafeMode?: boolean; usage?: string } = {},
): { command: RpcCommand; calls: () => number } {
  let count = 0
  const handler: RpcHandler = async (params, helpRequested) => {
    if (helpRequested) return options.usage ?? `${name}\n\nUsage of ${name}.`
    count += 1
    return { method: name, params }
  }
  return {
    command: {
      category: options.category ?? 'util',
      name,
      handler,
      okSafeMode: options.okSafeMode ?? true,
    },
    calls: () => count,
  }
}
