import type { CommandTable } from './table.js'
import { MalformedRequestError, parseRequest } from './request.js'
import { parseError, replyObject, toRpcError, type RpcId, type RpcResponse } from './protocol.js'

/**
 * Parse and execute one request value. Never rejects: every failure becomes
 * an error reply tagged with the request id.
 */
export async function executeOne(table: CommandTable, value: unknown): Promise<RpcResponse> {
  let id: RpcId = null
  try {
    const request = parseRequest(value)
    id = request.id
    const result = await table.execute(request.method, request.params)
    return replyObject(result, null, id)
  } catch (err) {
    if (err instanceof MalformedRequestError) {
      return replyObject(null, err, err.requestId)
    }
    return replyObject(null, toRpcError(err), id)
  }
}

/**
 * One reply per request, in input order. Requests run one after another so
 * a failure in one item cannot affect the next.
 */
export async function executeBatch(table: CommandTable, values: unknown[]): Promise<RpcResponse[]> {
  const replies: RpcResponse[] = []
  for (const value of values) {
    replies.push(await executeOne(table, value))
  }
  return replies
}

/**
 * Decode and run a raw JSON-RPC payload: a single request object or a batch
 * array. Undecodable text yields a parse-error reply with a null id.
 */
export async function processPayload(
  table: CommandTable,
  text: string,
): Promise<RpcResponse | RpcResponse[]> {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch {
    return replyObject(null, parseError('Parse error'), null)
  }

  if (Array.isArray(value)) {
    return executeBatch(table, value)
  }
  if (typeof value === 'object' && value !== null) {
    return executeOne(table, value)
  }
  return replyObject(null, parseError('Top-level object parse error'), null)
}

/** Serialized reply for a raw payload, followed by a newline. */
export async function handlePayload(table: CommandTable, text: string): Promise<string> {
  return serializeReply(await processPayload(table, text))
}

export function serializeReply(reply: RpcResponse | RpcResponse[]): string {
  return JSON.stringify(reply) + '\n'
}
