import type { RpcCommand, SafeModeSource } from './types.js'
import type { RpcParams } from './request.js'
import type { WarmupGate } from './warmup.js'
import type { RpcSignals } from './signals.js'
import { forbiddenInSafeMode, methodNotFound, toRpcError } from './protocol.js'

export interface CommandTableDeps {
  warmup: WarmupGate
  signals: RpcSignals
  safeMode: SafeModeSource
  disableSafeMode?: boolean
}

/** Category whose commands are left out of the help listing. */
const HIDDEN_CATEGORY = 'hidden'

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1)
}

/**
 * Method name → command dispatch table.
 * Registration is only possible until the table is frozen.
 */
export class CommandTable {
  private commands = new Map<string, RpcCommand>()
  private isFrozen = false

  constructor(private readonly deps: CommandTableDeps) {}

  /**
   * Add a command under `command.name`, or under `name` when given.
   * Returns false if the table is frozen or the name is taken.
   */
  register(command: RpcCommand): boolean
  register(name: string, command: RpcCommand): boolean
  register(nameOrCommand: string | RpcCommand, maybeCommand?: RpcCommand): boolean {
    const command = typeof nameOrCommand === 'string' ? maybeCommand : nameOrCommand
    if (!command) return false
    const name = typeof nameOrCommand === 'string' ? nameOrCommand : command.name

    if (this.isFrozen) {
      console.warn(`[rpc] Rejected registration of "${name}": table is frozen`)
      return false
    }
    if (this.commands.has(name)) {
      console.warn(`[rpc] Rejected registration of "${name}": name already registered`)
      return false
    }

    this.commands.set(name, Object.freeze({ ...command, name }))
    return true
  }

  /** One-way: no registration is accepted afterwards. */
  freeze(): void {
    this.isFrozen = true
  }

  get frozen(): boolean {
    return this.isFrozen
  }

  get(name: string): RpcCommand | undefined {
    return this.commands.get(name)
  }

  /** Registered commands in registration order. */
  list(): RpcCommand[] {
    return Array.from(this.commands.values())
  }

  get size(): number {
    return this.commands.size
  }

  /**
   * Execute a method.
   * Order: warmup gate, lookup, safe mode, pre-command hooks, handler,
   * post-command hooks. Rejects with an RpcError on any failure.
   */
  async execute(method: string, params: RpcParams): Promise<unknown> {
    this.deps.warmup.assertReady()

    const command = this.commands.get(method)
    if (!command) throw methodNotFound()

    // Refuse before any hook sees the call
    if (!this.deps.disableSafeMode && !command.okSafeMode) {
      const warning = this.deps.safeMode()
      if (warning) throw forbiddenInSafeMode(warning)
    }

    const { signals } = this.deps
    signals.preCommand.emit(command)

    try {
      const result = await command.handler(params, false)
      signals.postCommand.emit(command, { ok: true })
      return result
    } catch (err) {
      const error = toRpcError(err)
      signals.postCommand.emit(command, { ok: false, error })
      throw error
    }
  }

  /**
   * Usage text. With no name: the first line of every visible command,
   * grouped by category. With a name: that command's full usage text.
   */
  async help(name: string = ''): Promise<string> {
    if (name) {
      const command = this.commands.get(name)
      if (!command) return `help: unknown command: ${name}`
      return this.usageOf(command)
    }

    const groups = new Map<string, string[]>()
    for (const command of this.commands.values()) {
      if (command.category === HIDDEN_CATEGORY) continue
      const usage = await this.usageOf(command)
      const firstLine = usage.split('\n', 1)[0] ?? command.name
      const lines = groups.get(command.category) ?? []
      lines.push(firstLine)
      groups.set(command.category, lines)
    }

    return Array.from(groups, ([category, lines]) =>
      [`== ${capitalize(category)} ==`, ...lines].join('\n'),
    ).join('\n\n')
  }

  private async usageOf(command: RpcCommand): Promise<string> {
    try {
      const text = await command.handler([], true)
      if (typeof text === 'string' && text.length > 0) return text
    } catch (err) {
      console.warn(`[rpc] Help for "${command.name}" failed:`, err instanceof Error ? err.message : err)
    }
    return command.name
  }
}
