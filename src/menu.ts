import debug from 'debug'
import { OperatorInterruptError } from './error.js'
import { listRunningTunnels } from './discovery.js'
import { createTunnel, type LifecycleContext, reloadAll, removeTunnel } from './lifecycle.js'
import type { RunningTunnel } from './types.js'

const log = debug('tunnel-menu:menu')

export type MenuState = 'listing' | 'awaitingCommand' | 'creating' | 'removing' | 'reloading' | 'exiting'

export type MenuCommand = 'create' | 'remove' | 'refresh' | 'reload' | 'quit' | 'invalid'

export type MenuEvent =
  | { type: 'displayed' }
  | { type: 'command'; command: MenuCommand }
  | { type: 'completed' }
  | { type: 'interrupted' }

export type MenuEffect =
  | { type: 'create' }
  | { type: 'remove' }
  | { type: 'reload' }
  | { type: 'notice'; message: string }
  | { type: 'farewell'; message: string }

export interface Transition {
  state: MenuState
  effects: MenuEffect[]
}

export const QUIT_MESSAGE = 'Exiting tunnel menu. Goodbye!'
export const INTERRUPT_MESSAGE = 'Tunnel menu terminated by user. Goodbye!'
export const INVALID_OPTION_MESSAGE = 'Invalid option. Please try again.'

const COMMAND_KEYS: Record<string, MenuCommand> = {
  '1': 'create',
  '2': 'remove',
  '3': 'refresh',
  '4': 'reload',
  q: 'quit',
}

export function parseCommand(input: string): MenuCommand {
  return COMMAND_KEYS[input.trim().toLowerCase()] ?? 'invalid'
}

function onCommand(command: MenuCommand): Transition {
  switch (command) {
    case 'create':
      return { state: 'creating', effects: [{ type: 'create' }] }
    case 'remove':
      return { state: 'removing', effects: [{ type: 'remove' }] }
    case 'reload':
      return { state: 'reloading', effects: [{ type: 'reload' }] }
    case 'refresh':
      return { state: 'listing', effects: [] }
    case 'quit':
      return { state: 'exiting', effects: [{ type: 'farewell', message: QUIT_MESSAGE }] }
    case 'invalid':
      return { state: 'listing', effects: [{ type: 'notice', message: INVALID_OPTION_MESSAGE }] }
  }
}

/**
 * Pure menu state machine. The driver performs the returned effects.
 */
export function transition(state: MenuState, event: MenuEvent): Transition {
  if (state === 'exiting') {
    return { state, effects: [] }
  }
  if (event.type === 'interrupted') {
    return { state: 'exiting', effects: [{ type: 'farewell', message: INTERRUPT_MESSAGE }] }
  }

  switch (state) {
    case 'listing':
      return event.type === 'displayed' ? { state: 'awaitingCommand', effects: [] } : { state, effects: [] }

    case 'awaitingCommand':
      return event.type === 'command' ? onCommand(event.command) : { state, effects: [] }

    case 'creating':
    case 'removing':
    case 'reloading':
      return event.type === 'completed' ? { state: 'listing', effects: [] } : { state, effects: [] }
  }
}

export function formatTunnelTable(tunnels: RunningTunnel[]): string[] {
  if (tunnels.length === 0) {
    return ['', 'No active tunnel processes found.']
  }

  const rule = '-'.repeat(80)
  const lines = [
    '',
    'Active Tunnel Processes:',
    rule,
    `${'#'.padEnd(3)} ${'PID'.padEnd(8)} ${'Port'.padEnd(6)} ${'Type'.padEnd(7)} ${'Name'.padEnd(20)} Command`,
    rule,
  ]
  tunnels.forEach((tunnel, index) => {
    lines.push(
      `${String(index + 1).padEnd(3)} ${String(tunnel.processId).padEnd(8)} ${tunnel.port.padEnd(6)} ${tunnel.kind.padEnd(7)} ${tunnel.name.padEnd(20)} ${tunnel.rawCommand.substring(0, 40)}...`,
    )
  })
  return lines
}

export class TunnelMenu {
  private state: MenuState = 'listing'
  // indices shown to the operator refer to this list until the next listing pass
  private displayed: RunningTunnel[] = []

  constructor(private context: LifecycleContext) {}

  get currentState(): MenuState {
    return this.state
  }

  /**
   * Run until the operator quits or interrupts.
   */
  async run(): Promise<void> {
    while (this.state !== 'exiting') {
      let event: MenuEvent
      try {
        event = await this.nextEvent()
      } catch (error) {
        if (!(error instanceof OperatorInterruptError)) throw error
        event = { type: 'interrupted' }
      }

      try {
        await this.apply(transition(this.state, event))
      } catch (error) {
        if (!(error instanceof OperatorInterruptError)) throw error
        await this.apply(transition(this.state, { type: 'interrupted' }))
      }
    }
  }

  private async nextEvent(): Promise<MenuEvent> {
    switch (this.state) {
      case 'listing':
        this.render()
        return { type: 'displayed' }
      case 'awaitingCommand':
        return { type: 'command', command: parseCommand(await this.context.io.ask('\nSelect an option: ')) }
      default:
        // the operation for this state already ran as an effect
        return { type: 'completed' }
    }
  }

  private async apply(next: Transition): Promise<void> {
    log('%s -> %s', this.state, next.state)
    this.state = next.state
    for (const effect of next.effects) {
      await this.perform(effect)
    }
  }

  private async perform(effect: MenuEffect): Promise<void> {
    const { io, config } = this.context
    switch (effect.type) {
      case 'create':
        await createTunnel(this.context)
        break
      case 'remove':
        await removeTunnel(this.context, this.displayed)
        break
      case 'reload':
        await reloadAll(this.context)
        break
      case 'notice':
        io.print(effect.message)
        await io.delay(config.noticeDelayMs / 2)
        break
      case 'farewell':
        io.clear()
        io.print(effect.message)
        break
    }
  }

  private render(): void {
    const { io } = this.context
    io.clear()
    io.print('='.repeat(60))
    io.print('                    Tunnel Menu')
    io.print('='.repeat(60))

    this.displayed = listRunningTunnels(this.context)
    for (const line of formatTunnelTable(this.displayed)) {
      io.print(line)
    }

    io.print('\nMenu Options:')
    io.print('1. Create a new tunnel')
    io.print('2. Remove a tunnel')
    io.print('3. Refresh tunnel list')
    io.print('4. Reload all persistent tunnels')
    io.print('q. Quit')
  }
}
