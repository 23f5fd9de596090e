import type { RpcParams } from './request.js'

/**
 * Handler for one RPC method. With `helpRequested` set it returns its usage
 * text and performs no side effects.
 */
export type RpcHandler = (params: RpcParams, helpRequested: boolean) => Promise<unknown>

export interface RpcCommand {
  readonly category: string
  readonly name: string
  readonly handler: RpcHandler
  /** Whether the command may run while the node reports safe mode. */
  readonly okSafeMode: boolean
}

/**
 * Returns the node's current safe-mode warning; empty when the node is healthy.
 */
export type SafeModeSource = () => string

/** Queue of long-running async operations started by RPC handlers. */
export interface AsyncRpcQueue {
  /** Cancel queued operations and wait for workers to finish. */
  closeAndWait(): Promise<void>
}
