import debug from 'debug'
import { ExternalCommandError } from './error.js'
import { parseRegistryTable } from './parsers.js'
import type { CommandRunner, ManagerConfig, OperatorConsole, PersistentDefinition } from './types.js'

const log = debug('tunnel-menu:registry')

export interface RegistryOptions {
  runner: CommandRunner
  io: OperatorConsole
  config: Pick<ManagerConfig, 'binary'>
}

/**
 * Read the tunnel definitions the tunnel binary keeps for relaunch at boot.
 */
export function listPersistentDefinitions({ runner, io, config }: RegistryOptions): PersistentDefinition[] {
  const args = ['--list']
  const result = runner.run(config.binary, args)
  if (result.error || result.status !== 0) {
    const error = ExternalCommandError.fromResult(config.binary, args, result)
    log('list query failed: %o', error)
    io.warn(`Error getting persistent tunnels: ${error.message}`)
    return []
  }

  const parsed = parseRegistryTable(result.stdout)
  if (parsed.kind === 'empty') {
    log('registry: %s', parsed.reason)
    return []
  }
  log('registry holds %d definition(s)', parsed.items.length)
  return parsed.items
}
