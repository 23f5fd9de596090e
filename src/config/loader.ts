import { readFileSync, existsSync } from 'node:fs'
import { config as loadDotenv } from 'dotenv'
import { ConfigSchema, type Config } from './schema.js'
import { getConfigFilePath } from './paths.js'

// Load .env file from project root
loadDotenv()

export interface LoadConfigOptions {
  configPath?: string
  env?: NodeJS.ProcessEnv
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {}
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath = options.configPath ?? getConfigFilePath()
  const env = options.env ?? process.env

  let fileConfig: Record<string, unknown> = {}
  if (existsSync(configPath)) {
    const raw = readFileSync(configPath, 'utf-8')
    fileConfig = asRecord(JSON.parse(raw))
  }

  // Apply env overrides
  const portEnv = env['CHAIN_RPC_PORT']
  const hostEnv = env['CHAIN_RPC_HOST']
  const safeModeEnv = env['CHAIN_RPC_DISABLE_SAFE_MODE']

  if (portEnv || hostEnv) {
    const gateway = asRecord(fileConfig.gateway)
    if (portEnv) gateway.port = parseInt(portEnv, 10)
    if (hostEnv) gateway.host = hostEnv
    fileConfig.gateway = gateway
  }

  if (safeModeEnv) {
    const rpc = asRecord(fileConfig.rpc)
    rpc.disableSafeMode = safeModeEnv === '1' || safeModeEnv === 'true'
    fileConfig.rpc = rpc
  }

  return ConfigSchema.parse(fileConfig)
}
