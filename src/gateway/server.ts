import { createServer } from 'node:http'
import { WebSocketServer } from 'ws'
import type { Config } from '../config/schema.js'
import type { RpcServer } from '../rpc/server.js'
import { EventLoopTimerDriver } from '../rpc/event-loop-timer.js'
import { createHttpHandler } from './http-handler.js'
import { handleConnection } from './ws-handler.js'

export interface Gateway {
  close(): Promise<void>
}

/**
 * Start the HTTP/WebSocket front end for `server` and register the
 * event-loop timer driver for as long as it runs.
 */
export async function startGateway(server: RpcServer, config: Config): Promise<Gateway> {
  const timerDriver = new EventLoopTimerDriver()
  server.timers.registerDriver(timerDriver)

  const httpServer = createServer(createHttpHandler(server, config))
  const wss = new WebSocketServer({ server: httpServer })
  wss.on('connection', (ws) => handleConnection(ws, server))

  await new Promise<void>((resolve) => {
    httpServer.listen(config.gateway.port, config.gateway.host, () => resolve())
  })

  console.log(`[gateway] Listening on http://${config.gateway.host}:${config.gateway.port}`)

  return {
    async close() {
      server.timers.unregisterDriver(timerDriver)

      return new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) client.terminate()
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err)
            else resolve()
          })
        })
      })
    },
  }
}
