import { loadConfig } from './config/loader.js'
import { getAuditLogPath } from './config/paths.js'
import { RpcServer } from './rpc/server.js'
import { createControlCommands } from './rpc/commands/control.js'
import { AuditLogger } from './security/audit.js'
import { startGateway } from './gateway/server.js'

const config = loadConfig()

// Allow --port CLI override
const portArgIdx = process.argv.indexOf('--port')
const portArg = portArgIdx !== -1 ? process.argv[portArgIdx + 1] : undefined
if (portArg) {
  config.gateway.port = parseInt(portArg, 10)
}

let shuttingDown = false

const server = new RpcServer({
  disableSafeMode: config.rpc.disableSafeMode,
  initialWarmupStatus: config.rpc.initialWarmupStatus,
})

for (const command of createControlCommands(server.table, () => requestShutdown())) {
  if (!server.table.register(command)) {
    throw new Error(`Failed to register RPC command "${command.name}"`)
  }
}

const auditLogger = new AuditLogger(getAuditLogPath(), config.security.auditLog)
auditLogger.attachToSignals(server.signals)

server.warmup.setStatus('Starting gateway...')
const gateway = await startGateway(server, config)
server.start()

server.warmup.setStatus('Done loading')
server.warmup.markFinished()
console.log('  ✓ RPC ready')

// Graceful shutdown
async function shutdown(): Promise<void> {
  console.log('\nShutting down...')
  server.interrupt()
  await gateway.close()
  await server.stop()
  await auditLogger.flush()
  process.exit(0)
}

function requestShutdown(): void {
  if (shuttingDown) return
  shuttingDown = true
  // Let the `stop` reply go out before the gateway closes
  setImmediate(() => {
    shutdown().catch((err) => {
      console.error('Shutdown failed:', err)
      process.exit(1)
    })
  })
}

process.on('SIGINT', requestShutdown)
process.on('SIGTERM', requestShutdown)
