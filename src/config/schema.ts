import { z } from 'zod'

export const ConfigSchema = z.object({
  gateway: z.object({
    port: z.number().default(8232),
    host: z.string().default('127.0.0.1'),
    maxBodyBytes: z.number().int().positive().default(1_000_000),
  }).default({}),
  rpc: z.object({
    disableSafeMode: z.boolean().default(false),
    initialWarmupStatus: z.string().default('RPC server started'),
  }).default({}),
  security: z.object({
    auditLog: z.boolean().default(true),
  }).default({}),
})

export type Config = z.infer<typeof ConfigSchema>
