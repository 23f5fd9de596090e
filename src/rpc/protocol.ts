/**
 * JSON-RPC error codes understood by node clients.
 * Standard JSON-RPC 2.0 codes plus the node's application codes.
 */
export const RpcErrorCode = {
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  PARSE_ERROR: -32700,

  MISC_ERROR: -1,
  FORBIDDEN_BY_SAFE_MODE: -2,
  IN_WARMUP: -28,
} as const

export type RpcErrorKind =
  | 'MethodNotFound'
  | 'StillWarmingUp'
  | 'ForbiddenInSafeMode'
  | 'InvalidParams'
  | 'HandlerFailure'
  | 'NoTimerDriver'
  | 'MalformedRequest'
  | 'ParseError'
  | 'Internal'

export interface RpcErrorObject {
  code: number
  message: string
}

/** Opaque correlation token: any JSON value, echoed back unchanged. */
export type RpcId = unknown

export interface RpcResponse {
  result: unknown
  error: RpcErrorObject | null
  id: RpcId
}

export class RpcError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly kind: RpcErrorKind = kindForCode(code),
  ) {
    super(message)
    this.name = 'RpcError'
  }

  toJSON(): RpcErrorObject {
    return { code: this.code, message: this.message }
  }
}

function kindForCode(code: number): RpcErrorKind {
  switch (code) {
    case RpcErrorCode.METHOD_NOT_FOUND: return 'MethodNotFound'
    case RpcErrorCode.IN_WARMUP: return 'StillWarmingUp'
    case RpcErrorCode.FORBIDDEN_BY_SAFE_MODE: return 'ForbiddenInSafeMode'
    case RpcErrorCode.INVALID_PARAMS: return 'InvalidParams'
    case RpcErrorCode.INVALID_REQUEST: return 'MalformedRequest'
    case RpcErrorCode.PARSE_ERROR: return 'ParseError'
    case RpcErrorCode.MISC_ERROR: return 'HandlerFailure'
    default: return 'Internal'
  }
}

// ── Error factories ──

export function methodNotFound(): RpcError {
  return new RpcError(RpcErrorCode.METHOD_NOT_FOUND, 'Method not found', 'MethodNotFound')
}

export function stillWarmingUp(status: string): RpcError {
  return new RpcError(RpcErrorCode.IN_WARMUP, status, 'StillWarmingUp')
}

export function forbiddenInSafeMode(warning: string): RpcError {
  return new RpcError(RpcErrorCode.FORBIDDEN_BY_SAFE_MODE, `Safe mode: ${warning}`, 'ForbiddenInSafeMode')
}

export function invalidParams(message: string): RpcError {
  return new RpcError(RpcErrorCode.INVALID_PARAMS, message, 'InvalidParams')
}

export function handlerFailure(message: string): RpcError {
  return new RpcError(RpcErrorCode.MISC_ERROR, message, 'HandlerFailure')
}

export function noTimerDriver(): RpcError {
  return new RpcError(RpcErrorCode.INTERNAL_ERROR, 'No timer handler registered for RPC', 'NoTimerDriver')
}

export function parseError(message: string): RpcError {
  return new RpcError(RpcErrorCode.PARSE_ERROR, message, 'ParseError')
}

/**
 * Convert anything thrown at the dispatch boundary into an RpcError.
 * RpcErrors pass through untouched.
 */
export function toRpcError(err: unknown): RpcError {
  if (err instanceof RpcError) return err
  if (err instanceof Error) return handlerFailure(err.message)
  return handlerFailure('Unknown error')
}

/** True when the client should retry the same call later. */
export function isRetryable(err: RpcError): boolean {
  return err.kind === 'StillWarmingUp'
}

export function replyObject(result: unknown, error: RpcError | null, id: RpcId): RpcResponse {
  if (error) {
    return { result: null, error: error.toJSON(), id }
  }
  return { result: result ?? null, error: null, id }
}
