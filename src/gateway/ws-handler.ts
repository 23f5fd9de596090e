import type { WebSocket } from 'ws'
import type { RpcServer } from '../rpc/server.js'

/**
 * Serve JSON-RPC over a WebSocket: every text message is one payload
 * (single request or batch) and gets exactly one reply.
 */
export function handleConnection(ws: WebSocket, server: RpcServer): void {
  const send = (data: string) => {
    if (ws.readyState === ws.OPEN) {
      ws.send(data)
    }
  }

  ws.on('message', (raw) => {
    if (!server.isRunning) {
      ws.close(1013, 'RPC server is not running')
      return
    }

    server.handlePayload(raw.toString())
      .then(send)
      .catch((err) => {
        console.error('[ws] Failed to handle message:', err instanceof Error ? err.message : err)
      })
  })

  ws.on('error', (err) => {
    console.error('[ws] Connection error:', err.message)
  })
}
