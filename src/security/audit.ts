import { appendFile } from 'node:fs/promises'
import type { RpcSignals, CommandOutcome } from '../rpc/signals.js'
import type { RpcCommand } from '../rpc/types.js'

export interface AuditEvent {
  ts: number // Unix ms
  type: 'command'
  method: string
  category: string
  ok: boolean
  code?: number
  message?: string
}

export class AuditLogger {
  private pending: Promise<void> = Promise.resolve()

  constructor(
    private readonly logPath: string,
    private readonly enabled: boolean,
  ) {}

  /**
   * Append an audit event to the JSONL log.
   * No-op if audit logging is disabled.
   */
  async append(event: AuditEvent): Promise<void> {
    if (!this.enabled) return

    const line = JSON.stringify(event) + '\n'

    try {
      await appendFile(this.logPath, line, 'utf-8')
    } catch (err) {
      // Audit failures must never reach the dispatcher
      console.warn('[audit] Failed to write audit log:', err instanceof Error ? err.message : err)
    }
  }

  /** Queue an entry for a finished command. Writes keep call order. */
  record(command: RpcCommand, outcome: CommandOutcome): void {
    const event: AuditEvent = {
      ts: Date.now(),
      type: 'command',
      method: command.name,
      category: command.category,
      ok: outcome.ok,
    }
    if (!outcome.ok) {
      event.code = outcome.error.code
      event.message = outcome.error.message
    }
    this.pending = this.pending.then(() => this.append(event))
  }

  /** Resolves once every queued entry has been written. */
  flush(): Promise<void> {
    return this.pending
  }

  /** Record every command outcome. Returns the detach function. */
  attachToSignals(signals: RpcSignals): () => void {
    return signals.postCommand.connect((command, outcome) => this.record(command, outcome))
  }
}
