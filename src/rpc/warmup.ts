import { stillWarmingUp } from './protocol.js'

export interface WarmupState {
  readonly inWarmup: boolean
  readonly status: string
}

export const DEFAULT_WARMUP_STATUS = 'RPC server started'

/**
 * Process readiness gate. Starts in warmup and opens exactly once.
 * The state is replaced as a whole so readers always see a matching pair.
 */
export class WarmupGate {
  private state: WarmupState

  constructor(initialStatus: string = DEFAULT_WARMUP_STATUS) {
    this.state = Object.freeze({ inWarmup: true, status: initialStatus })
  }

  setStatus(status: string): void {
    if (!this.state.inWarmup) {
      console.warn(`[warmup] Ignoring status "${status}": warmup already finished`)
      return
    }
    this.state = Object.freeze({ inWarmup: true, status })
  }

  /** Open the gate. Returns false if it was already open. */
  markFinished(): boolean {
    if (!this.state.inWarmup) {
      console.warn('[warmup] markFinished called twice')
      return false
    }
    this.state = Object.freeze({ inWarmup: false, status: this.state.status })
    return true
  }

  query(): WarmupState {
    return this.state
  }

  /** Throws StillWarmingUp with the current status while the gate is closed. */
  assertReady(): void {
    const { inWarmup, status } = this.state
    if (inWarmup) throw stillWarmingUp(status)
  }
}
