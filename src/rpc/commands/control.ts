import { z } from 'zod'
import type { RpcCommand } from '../types.js'
import type { CommandTable } from '../table.js'
import { invalidParams } from '../protocol.js'

export function helpExampleCli(method: string, args: string): string {
  return `> chain-rpc-cli ${method} ${args}\n`
}

export function helpExampleRpc(method: string, args: string): string {
  return (
    `> curl --data-binary '{"jsonrpc": "1.0", "id":"curltest", ` +
    `"method": "${method}", "params": [${args}] }' -H 'content-type: text/plain;' http://127.0.0.1:8232/\n`
  )
}

const HelpParams = z.array(z.string()).max(1)

const HELP_USAGE =
  'help ( "command" )\n' +
  '\nList all commands, or get help for a specified command.\n' +
  '\nArguments:\n' +
  '1. "command"     (string, optional) The command to get help on\n' +
  '\nResult:\n' +
  '"text"     (string) The help text\n'

const STOP_USAGE =
  'stop\n' +
  '\nStop the node server.\n'

/** `help` and `stop`. `onStop` is called once per `stop` call. */
export function createControlCommands(table: CommandTable, onStop: () => void): RpcCommand[] {
  const help: RpcCommand = {
    category: 'control',
    name: 'help',
    okSafeMode: true,
    handler: async (params, helpRequested) => {
      if (helpRequested) return HELP_USAGE
      const args = Array.isArray(params) ? params : [params.command].filter((v) => v !== undefined)
      const parsed = HelpParams.safeParse(args)
      if (!parsed.success) {
        throw invalidParams(`Invalid params: ${parsed.error.message}`)
      }
      return table.help(parsed.data[0] ?? '')
    },
  }

  const stop: RpcCommand = {
    category: 'control',
    name: 'stop',
    okSafeMode: true,
    handler: async (_params, helpRequested) => {
      if (helpRequested) return STOP_USAGE
      onStop()
      return 'Server stopping'
    },
  }

  return [help, stop]
}
