export type TunnelKind = 'HTTP' | 'Custom'

export interface RunningTunnel {
  processId: number
  port: string
  name: string
  kind: TunnelKind
  rawCommand: string
}

export interface PersistentDefinition {
  id: string
  rawArgs: string
}

export type MatchResult = { isPersistent: false } | { isPersistent: true; persistentId: string }

/**
 * Outcome of parsing one external command's output. A malformed line never
 * throws; it either gets skipped or the whole output becomes `empty`.
 */
export type ParseResult<T> = { kind: 'parsed'; items: T[] } | { kind: 'empty'; reason: string }

export interface CommandResult {
  status: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  error?: NodeJS.ErrnoException
}

/**
 * Everything the manager does to the outside world besides talking to the operator.
 */
export interface CommandRunner {
  /** Run a command to completion and capture its output. */
  run(command: string, args: string[]): CommandResult
  /** Start a detached process that outlives the manager. */
  launch(command: string, args: string[]): Promise<void>
  /** Send SIGTERM to a process. */
  terminate(processId: number): void
}

export interface OperatorConsole {
  ask(question: string): Promise<string>
  print(message?: string): void
  warn(message: string): void
  clear(): void
  delay(ms: number): Promise<void>
}

export interface ManagerConfig {
  binary: string
  managerName: string
  settleDelayMs: number
  launchDelayMs: number
  noticeDelayMs: number
}
