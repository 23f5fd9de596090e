import type { AsyncRpcQueue, SafeModeSource } from './types.js'
import { CommandTable } from './table.js'
import { WarmupGate, DEFAULT_WARMUP_STATUS } from './warmup.js'
import { RpcSignals } from './signals.js'
import { TimerScheduler } from './timers.js'
import { handlePayload, processPayload } from './batch.js'
import type { RpcResponse } from './protocol.js'

export interface RpcServerOptions {
  /** Current safe-mode warning of the node; empty string when healthy. */
  safeMode?: SafeModeSource
  disableSafeMode?: boolean
  initialWarmupStatus?: string
  asyncQueue?: AsyncRpcQueue
}

/**
 * Owns the dispatch state of one RPC server: command table, warmup gate,
 * named timers, lifecycle signals and the async operation queue.
 */
export class RpcServer {
  readonly warmup: WarmupGate
  readonly signals = new RpcSignals()
  readonly timers = new TimerScheduler()
  readonly table: CommandTable

  private running = false
  private started = false
  private stopped = false
  private readonly asyncQueue: AsyncRpcQueue | null

  constructor(options: RpcServerOptions = {}) {
    this.warmup = new WarmupGate(options.initialWarmupStatus ?? DEFAULT_WARMUP_STATUS)
    this.table = new CommandTable({
      warmup: this.warmup,
      signals: this.signals,
      safeMode: options.safeMode ?? (() => ''),
      disableSafeMode: options.disableSafeMode ?? false,
    })
    this.asyncQueue = options.asyncQueue ?? null
  }

  /** Freeze the table and fire `started`. Only the first call has any effect. */
  start(): boolean {
    if (this.started) return false
    this.started = true
    this.table.freeze()
    this.running = true
    console.log(`[rpc] Starting RPC with ${this.table.size} command(s)`)
    this.signals.started.emit()
    return true
  }

  /** Stop accepting new work. The table stays frozen. */
  interrupt(): void {
    if (this.running) console.log('[rpc] Interrupting RPC')
    this.running = false
  }

  /**
 * Cancel named timers, fire `stopped` and drain the async queue.
 * No-op unless the server was started.
 */
  async stop(): Promise<void> {
    if (this.stopped || !this.started) return
    this.stopped = true
    this.running = false
    console.log('[rpc] Stopping RPC')

    this.timers.clear()
    this.signals.stopped.emit()

    if (this.asyncQueue) {
      console.log('[rpc] Waiting for async RPC workers to stop')
      await this.asyncQueue.closeAndWait()
    }
  }

  get isRunning(): boolean {
    return this.running
  }

  getAsyncQueue(): AsyncRpcQueue | null {
    return this.asyncQueue
  }

  runLater(name: string, callback: () => void, delaySeconds: number): void {
    this.timers.runLater(name, callback, delaySeconds)
  }

  processPayload(text: string): Promise<RpcResponse | RpcResponse[]> {
    return processPayload(this.table, text)
  }

  handlePayload(text: string): Promise<string> {
    return handlePayload(this.table, text)
  }
}
