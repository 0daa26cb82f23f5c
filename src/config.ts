import type { ManagerConfig } from './types.js'

export const DEFAULT_CONFIG: ManagerConfig = {
  binary: 'pitunnel',
  managerName: 'tunnel-menu',
  settleDelayMs: 2000,
  launchDelayMs: 1000,
  noticeDelayMs: 2000,
}

export function resolveConfig(overrides: Partial<ManagerConfig> = {}): ManagerConfig {
  const config: ManagerConfig = { ...DEFAULT_CONFIG }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(config, { [key]: value })
    }
  }

  if (!config.binary.trim()) {
    throw new Error('Tunnel binary must not be empty')
  }
  for (const key of ['settleDelayMs', 'launchDelayMs', 'noticeDelayMs'] as const) {
    const value = config[key]
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`${key} must be a non-negative integer, got ${value}`)
    }
  }
  return config
}
