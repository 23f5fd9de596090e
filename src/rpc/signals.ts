import type { RpcCommand } from './types.js'
import type { RpcError } from './protocol.js'

export type CommandOutcome =
  | { ok: true }
  | { ok: false; error: RpcError }

/**
 * Ordered observer list. Slots run synchronously, in attachment order.
 * A throwing slot is logged and does not stop the others.
 */
export class Signal<Args extends unknown[]> {
  private slots: Array<(...args: Args) => void> = []

  constructor(private readonly label: string) {}

  /** Attach a slot. Returns a function that detaches it. */
  connect(slot: (...args: Args) => void): () => void {
    const entry = (...args: Args) => slot(...args)
    this.slots.push(entry)
    return () => {
      this.slots = this.slots.filter((s) => s !== entry)
    }
  }

  emit(...args: Args): void {
    // Snapshot so a slot detaching itself mid-emit doesn't skip its neighbour
    for (const slot of [...this.slots]) {
      try {
        slot(...args)
      } catch (err) {
        console.error(`[signals] ${this.label} subscriber failed:`, err)
      }
    }
  }

  get size(): number {
    return this.slots.length
  }
}

export class RpcSignals {
  readonly started = new Signal<[]>('started')
  readonly stopped = new Signal<[]>('stopped')
  readonly preCommand = new Signal<[command: RpcCommand]>('preCommand')
  readonly postCommand = new Signal<[command: RpcCommand, outcome: CommandOutcome]>('postCommand')
}
