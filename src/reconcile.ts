import { UNNAMED } from './parsers.js'
import type { MatchResult, PersistentDefinition, RunningTunnel } from './types.js'

/**
 * Decide whether a running process belongs to a persistent definition.
 *
 * The process table and the registry share no identifier, so this matches on
 * the saved arguments: `--port=<port>` must appear, and `--name=<name>` too
 * unless the process is unnamed. The first definition in registry order wins.
 * Two tunnels on the same port can be confused.
 */
export function match(tunnel: Pick<RunningTunnel, 'port' | 'name'>, definitions: PersistentDefinition[]): MatchResult {
  const found = definitions.find(
    (definition) =>
      definition.rawArgs.includes(`--port=${tunnel.port}`) &&
      (tunnel.name === UNNAMED || definition.rawArgs.includes(`--name=${tunnel.name}`)),
  )
  return found ? { isPersistent: true, persistentId: found.id } : { isPersistent: false }
}
