import debug from 'debug'
import { ExternalCommandError } from './error.js'
import { parseProcessTable, parseStatusTable } from './parsers.js'
import type { CommandRunner, ManagerConfig, OperatorConsole, RunningTunnel } from './types.js'

const log = debug('tunnel-menu:discovery')

export interface DiscoveryOptions {
  runner: CommandRunner
  io: OperatorConsole
  config: Pick<ManagerConfig, 'binary' | 'managerName'>
  ownProcessId?: number
}

/**
 * Find the tunnel processes running right now. Asks the tunnel binary first and
 * scans the process table when that yields nothing. Always re-queries; results
 * are never cached.
 */
export function listRunningTunnels(options: DiscoveryOptions): RunningTunnel[] {
  const fromStatus = queryStatus(options)
  if (fromStatus.length > 0) {
    return fromStatus
  }
  return scanProcessTable(options)
}

function queryStatus({ runner, config }: DiscoveryOptions): RunningTunnel[] {
  const args = ['--status']
  const result = runner.run(config.binary, args)
  if (result.error || result.status !== 0) {
    log('status query unavailable: %s', ExternalCommandError.fromResult(config.binary, args, result).message)
    return []
  }

  const parsed = parseStatusTable(result.stdout, config.binary)
  if (parsed.kind === 'empty') {
    log('status query gave nothing usable (%s), falling back to process table', parsed.reason)
    return []
  }
  log('status query found %d tunnel(s)', parsed.items.length)
  return parsed.items
}

function scanProcessTable({ runner, io, config, ownProcessId }: DiscoveryOptions): RunningTunnel[] {
  const args = ['aux']
  const result = runner.run('ps', args)
  if (result.error || result.status !== 0) {
    const error = ExternalCommandError.fromResult('ps', args, result)
    log('process table scan failed: %o', error)
    io.warn(`Error getting processes: ${error.message}`)
    return []
  }

  const parsed = parseProcessTable(result.stdout, {
    binary: config.binary,
    managerName: config.managerName,
    ownProcessId: ownProcessId ?? process.pid,
  })
  if (parsed.kind === 'empty') {
    log('process table: %s', parsed.reason)
    return []
  }
  log('process table found %d tunnel(s)', parsed.items.length)
  return parsed.items
}
