import type { IncomingMessage, ServerResponse } from 'node:http'
import type { Config } from '../config/schema.js'
import type { RpcServer } from '../rpc/server.js'
import { RpcErrorCode, type RpcResponse } from '../rpc/protocol.js'
import { serializeReply } from '../rpc/batch.js'

class BodyTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`)
    this.name = 'BodyTooLargeError'
  }
}

/**
 * HTTP status for a reply. Batches always answer 200; single calls map
 * their error code.
 */
export function httpStatusFor(reply: RpcResponse | RpcResponse[]): number {
  if (Array.isArray(reply) || !reply.error) return 200
  switch (reply.error.code) {
    case RpcErrorCode.METHOD_NOT_FOUND:
      return 404
    case RpcErrorCode.INVALID_REQUEST:
    case RpcErrorCode.PARSE_ERROR:
      return 400
    default:
      return 500
  }
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0
    req.on('data', (chunk: Buffer) => {
      size += chunk.length
      if (size > limit) {
        reject(new BodyTooLargeError(limit))
        req.destroy()
        return
      }
      chunks.push(chunk)
    })
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')))
    req.on('error', reject)
  })
}

function sendJson(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'Content-Type': 'application/json' })
  res.end(body)
}

export function createHttpHandler(server: RpcServer, config: Config) {
  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (req.method === 'GET' && req.url === '/health') {
      const warmup = server.warmup.query()
      sendJson(res, 200, JSON.stringify({
        running: server.isRunning,
        inWarmup: warmup.inWarmup,
        status: warmup.status,
        uptime: process.uptime(),
      }))
      return
    }

    if (req.method !== 'POST' || (req.url !== '/' && req.url !== '')) {
      sendJson(res, 404, JSON.stringify({ error: 'not found' }))
      return
    }

    if (!server.isRunning) {
      sendJson(res, 503, JSON.stringify({ error: 'RPC server is not running' }))
      return
    }

    let body: string
    try {
      body = await readBody(req, config.gateway.maxBodyBytes)
    } catch (err) {
      if (err instanceof BodyTooLargeError) {
        sendJson(res, 413, JSON.stringify({ error: err.message }))
        return
      }
      throw err
    }

    const reply = await server.processPayload(body)
    sendJson(res, httpStatusFor(reply), serializeReply(reply))
  }

  return (req: IncomingMessage, res: ServerResponse) => {
    handle(req, res).catch((err) => {
      console.error('[gateway] Request failed:', err instanceof Error ? err.message : err)
      if (!res.headersSent) {
        sendJson(res, 500, JSON.stringify({ error: 'Internal error' }))
      } else {
        res.end()
      }
    })
  }
}
