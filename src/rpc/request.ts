import { RpcError, RpcErrorCode, type RpcId } from './protocol.js'

export type RpcParams = unknown[] | Record<string, unknown>

export interface RpcRequest {
  id: RpcId
  method: string
  params: RpcParams
}

/**
 * Raised when a request object is malformed. Carries whatever id could be
 * read so the reply can still be correlated.
 */
export class MalformedRequestError extends RpcError {
  constructor(
    message: string,
    public readonly requestId: RpcId,
  ) {
    super(RpcErrorCode.INVALID_REQUEST, message, 'MalformedRequest')
    this.name = 'MalformedRequestError'
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a decoded JSON value into a request.
 * Shape errors surface here, never at dispatch time.
 */
export function parseRequest(value: unknown): RpcRequest {
  if (!isPlainObject(value)) {
    throw new MalformedRequestError('Invalid Request object', null)
  }

  const id: RpcId = value.id ?? null

  const method = value.method
  if (method === undefined || method === null) {
    throw new MalformedRequestError('Missing method', id)
  }
  if (typeof method !== 'string') {
    throw new MalformedRequestError('Method must be a string', id)
  }
  if (method.length === 0) {
    throw new MalformedRequestError('Method must not be empty', id)
  }

  const rawParams = value.params
  let params: RpcParams
  if (rawParams === undefined || rawParams === null) {
    params = []
  } else if (Array.isArray(rawParams) || isPlainObject(rawParams)) {
    params = rawParams
  } else {
    throw new MalformedRequestError('Params must be an array or object', id)
  }

  return { id, method, params }
}
