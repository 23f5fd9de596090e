import type { TimerDriver, TimerHandle } from './timers.js'

/** Node.js setTimeout max delay (2^31 - 1 ms, ~24.8 days). */
const MAX_TIMEOUT_MS = 2_147_483_647

/**
 * Timer driver backed by the Node.js event loop.
 * Delays past the setTimeout ceiling are relayed in chunks.
 */
export class EventLoopTimerDriver implements TimerDriver {
  name(): string {
    return 'EventLoop'
  }

  newTimer(callback: () => void, delayMillis: number): TimerHandle {
    let timer: ReturnType<typeof setTimeout> | null = null
    let cancelled = false
    const deadline = Date.now() + Math.max(0, delayMillis)

    const arm = (remaining: number) => {
      if (remaining > MAX_TIMEOUT_MS) {
        timer = setTimeout(() => arm(deadline - Date.now()), MAX_TIMEOUT_MS)
        return
      }
      timer = setTimeout(() => {
        timer = null
        if (!cancelled) callback()
      }, Math.max(0, remaining))
    }

    arm(Math.max(0, delayMillis))

    return {
      cancel() {
        cancelled = true
        if (timer) clearTimeout(timer)
        timer = null
      },
    }
  }
}
