import debug from 'debug'
import { assertSucceeded, errorMessage } from './error.js'
import { match } from './reconcile.js'
import { listPersistentDefinitions } from './registry.js'
import type { CommandRunner, ManagerConfig, OperatorConsole, PersistentDefinition, RunningTunnel, TunnelKind } from './types.js'

const log = debug('tunnel-menu:lifecycle')

export interface LifecycleContext {
  runner: CommandRunner
  io: OperatorConsole
  config: ManagerConfig
}

export interface CreateRequest {
  port: string
  kind: TunnelKind
  name?: string
  persist: boolean
}

export interface ReloadOutcome {
  id: string
  removed: boolean
  relaunched: boolean
  error?: string
}

function isYes(answer: string): boolean {
  return answer.trim().toLowerCase().startsWith('y')
}

async function pause(io: OperatorConsole): Promise<void> {
  await io.ask('Press Enter to continue...')
}

export function buildCreateArgs(request: CreateRequest): string[] {
  const args = [`--port=${request.port}`]
  if (request.kind === 'HTTP') {
    args.push('--http')
  }
  if (request.name) {
    args.push(`--name=${request.name}`)
  }
  if (request.persist) {
    args.push('--persist')
  }
  return args
}

async function askCreateRequest(io: OperatorConsole): Promise<CreateRequest> {
  let port: string
  while (true) {
    port = (await io.ask('Local port to expose: ')).trim()
    if (/^\d+$/.test(port)) break
    io.print('Please enter a valid port number.')
  }

  io.print('\nTunnel Type:')
  io.print('1. HTTP (default)')
  io.print('2. Custom')
  const type = (await io.ask('Select tunnel type [1]: ')).trim() || '1'

  const name = (await io.ask('\nTunnel name (subdomain) [optional]: ')).trim()
  const persist = isYes(await io.ask('\nMake tunnel persistent? (y/n) [n]: '))

  return { port, kind: type === '1' ? 'HTTP' : 'Custom', name: name || undefined, persist }
}

/**
 * Ask the operator for tunnel options and launch it detached.
 * Returns true when a tunnel process was started.
 */
export async function createTunnel({ runner, io, config }: LifecycleContext): Promise<boolean> {
  io.print('\nCreate a new tunnel')
  io.print('-'.repeat(40))

  const request = await askCreateRequest(io)
  const args = buildCreateArgs(request)

  io.print('\nCommand to execute:')
  io.print([config.binary, ...args].join(' '))
  if (!isYes(await io.ask('\nCreate tunnel? (y/n): '))) {
    io.print('\nTunnel creation cancelled.')
    await io.delay(config.noticeDelayMs / 2)
    return false
  }

  try {
    await runner.launch(config.binary, args)
    log('created tunnel on port %s', request.port)
    io.print('\nTunnel created successfully!')
    await io.delay(config.noticeDelayMs)
    return true
  } catch (error) {
    log('create failed: %o', error)
    io.print(`\nError creating tunnel: ${errorMessage(error)}`)
    await pause(io)
    return false
  }
}

async function askSelection(io: OperatorConsole, count: number): Promise<number | null> {
  while (true) {
    const answer = (await io.ask('\nEnter the number of the tunnel to remove (or 0 to cancel): ')).trim()
    if (answer === '0') return null

    if (!/^\d+$/.test(answer)) {
      io.print('Please enter a valid number.')
      continue
    }
    const choice = Number(answer)
    if (choice >= 1 && choice <= count) return choice
    io.print('Invalid selection. Please try again.')
  }
}

/**
 * Stop one of the tunnels from the last displayed list. Persistent tunnels are
 * removed from the tunnel binary's registry and stopped; transient ones get
 * SIGTERM.
 */
export async function removeTunnel(context: LifecycleContext, tunnels: RunningTunnel[]): Promise<void> {
  const { runner, io, config } = context
  if (tunnels.length === 0) {
    io.print('\nNo active tunnels to remove.')
    await pause(io)
    return
  }

  const choice = await askSelection(io, tunnels.length)
  if (choice === null) return

  const tunnel = tunnels[choice - 1]
  const matched = match(tunnel, listPersistentDefinitions(context))
  log('selected #%d pid=%d persistent=%s', choice, tunnel.processId, matched.isPersistent)

  const question = matched.isPersistent
    ? `Tunnel #${choice} (PID ${tunnel.processId}, Port ${tunnel.port}) is persistent. Remove permanently? (y/n): `
    : `Are you sure you want to terminate tunnel #${choice} (PID ${tunnel.processId})? (y/n): `
  if (!isYes(await io.ask(question))) {
    io.print('Operation cancelled.')
    await io.delay(config.noticeDelayMs / 2)
    return
  }

  try {
    if (matched.isPersistent) {
      const removeArgs = ['--remove', matched.persistentId]
      assertSucceeded(config.binary, removeArgs, runner.run(config.binary, removeArgs))
      io.print(`Persistent tunnel (ID ${matched.persistentId}) has been removed.`)

      const stopArgs = ['--stop', `--port=${tunnel.port}`]
      try {
        assertSucceeded(config.binary, stopArgs, runner.run(config.binary, stopArgs))
        io.print(`Tunnel on port ${tunnel.port} has been stopped.`)
      } catch (error) {
        log('stop by port failed, signalling pid %d: %o', tunnel.processId, error)
        runner.terminate(tunnel.processId)
        io.print(`Tunnel with PID ${tunnel.processId} has been terminated.`)
      }
    } else {
      runner.terminate(tunnel.processId)
      io.print(`Tunnel with PID ${tunnel.processId} has been terminated.`)
    }
    await io.delay(config.noticeDelayMs)
  } catch (error) {
    log('remove failed: %o', error)
    io.print(`Error removing tunnel: ${errorMessage(error)}`)
    await pause(io)
  }
}

/**
 * Saved arguments, plus `--persist` when missing so the relaunched tunnel is
 * registered again.
 */
export function relaunchArgs(definition: PersistentDefinition): string[] {
  const args = definition.rawArgs.split(/\s+/).filter(Boolean)
  if (!args.includes('--persist')) {
    args.push('--persist')
  }
  return args
}

/**
 * Remove every persistent definition, then launch each again from its saved
 * arguments. Per-item failures are collected, never thrown.
 */
export async function reloadAll(context: LifecycleContext): Promise<ReloadOutcome[]> {
  const { runner, io, config } = context
  const definitions = listPersistentDefinitions(context)
  if (definitions.length === 0) {
    io.print('\nNo persistent tunnels configured.')
    await pause(io)
    return []
  }

  io.print('\nPersistent tunnels:')
  io.print('-'.repeat(60))
  io.print(`${'ID'.padEnd(6)} Arguments`)
  io.print('-'.repeat(60))
  for (const definition of definitions) {
    io.print(`${definition.id.padEnd(6)} ${definition.rawArgs}`)
  }

  if (!isYes(await io.ask(`\nReload all ${definitions.length} persistent tunnel(s)? (y/n): `))) {
    io.print('Reload cancelled.')
    await io.delay(config.noticeDelayMs / 2)
    return []
  }

  const outcomes: ReloadOutcome[] = definitions.map((definition) => ({
    id: definition.id,
    removed: false,
    relaunched: false,
  }))

  for (const [index, definition] of definitions.entries()) {
    const args = ['--remove', definition.id]
    try {
      assertSucceeded(config.binary, args, runner.run(config.binary, args))
      outcomes[index].removed = true
      io.print(`Removed persistent tunnel ${definition.id}.`)
    } catch (error) {
      log('remove %s failed: %o', definition.id, error)
      outcomes[index].error = errorMessage(error)
      io.print(`Failed to remove tunnel ${definition.id}: ${errorMessage(error)}`)
    }
  }

  await io.delay(config.settleDelayMs)

  for (const [index, definition] of definitions.entries()) {
    if (index > 0) {
      await io.delay(config.launchDelayMs)
    }
    try {
      await runner.launch(config.binary, relaunchArgs(definition))
      outcomes[index].relaunched = true
      io.print(`Relaunched tunnel ${definition.id}: ${definition.rawArgs}`)
    } catch (error) {
      log('relaunch %s failed: %o', definition.id, error)
      const previous = outcomes[index].error
      outcomes[index].error = previous ? `${previous}; ${errorMessage(error)}` : errorMessage(error)
      io.print(`Failed to relaunch tunnel ${definition.id}: ${errorMessage(error)}`)
    }
  }

  io.print('\nReload summary:')
  for (const outcome of outcomes) {
    const removed = outcome.removed ? 'removed' : 'remove failed'
    const relaunched = outcome.relaunched ? 'relaunched' : 'relaunch failed'
    io.print(`  ${outcome.id}: ${removed}, ${relaunched}`)
  }
  await pause(io)
  return outcomes
}
