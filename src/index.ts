import { DEFAULT_CONFIG, resolveConfig } from './config.js'
import { TerminalConsole } from './console.js'
import { listRunningTunnels } from './discovery.js'
import {
  ExternalCommandError,
  type ExternalCommandErrorCode,
  OperatorInterruptError,
  SignalDeliveryError,
  type SignalDeliveryErrorCode,
} from './error.js'
import { buildCreateArgs, createTunnel, reloadAll, removeTunnel } from './lifecycle.js'
import { TunnelMenu, transition } from './menu.js'
import { match } from './reconcile.js'
import { listPersistentDefinitions } from './registry.js'
import { ChildProcessRunner } from './runner.js'
import type {
  CommandResult,
  CommandRunner,
  ManagerConfig,
  MatchResult,
  OperatorConsole,
  PersistentDefinition,
  RunningTunnel,
} from './types.js'

export {
  ChildProcessRunner,
  DEFAULT_CONFIG,
  ExternalCommandError,
  OperatorInterruptError,
  SignalDeliveryError,
  TerminalConsole,
  TunnelMenu,
  buildCreateArgs,
  createTunnel,
  listPersistentDefinitions,
  listRunningTunnels,
  match,
  reloadAll,
  removeTunnel,
  resolveConfig,
  transition,
}
export type {
  CommandResult,
  CommandRunner,
  ExternalCommandErrorCode,
  ManagerConfig,
  MatchResult,
  OperatorConsole,
  PersistentDefinition,
  RunningTunnel,
  SignalDeliveryErrorCode,
}

export interface TunnelMenuOptions extends Partial<ManagerConfig> {
  runner?: CommandRunner
  io?: OperatorConsole
}

/**
 * Build a menu wired to the real process table and terminal unless a runner or
 * console is supplied.
 */
export function tunnelMenu(options: TunnelMenuOptions = {}): TunnelMenu {
  const { runner = new ChildProcessRunner(), io = new TerminalConsole(), ...overrides } = options
  return new TunnelMenu({ runner, io, config: resolveConfig(overrides) })
}

export default tunnelMenu
