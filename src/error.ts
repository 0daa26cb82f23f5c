import type { CommandResult } from './types.js'

/**
 * Error codes for external command failures
 */
export type ExternalCommandErrorCode =
  | 'ENOENT' // Binary not found on PATH
  | 'EACCES' // Binary found but not executable
  | 'NON_ZERO_EXIT' // Command ran and reported failure
  | 'SIGNALED' // Command was killed by a signal
  | 'UNKNOWN'

export class ExternalCommandError extends Error {
  public readonly code: ExternalCommandErrorCode
  public readonly command: string
  public readonly args: string[]
  public readonly exitCode: number | null

  constructor(code: ExternalCommandErrorCode, command: string, args: string[], exitCode: number | null, message: string) {
    super(message)
    this.name = 'ExternalCommandError'
    this.code = code
    this.command = command
    this.args = args
    this.exitCode = exitCode
  }

  static fromResult(command: string, args: string[], result: CommandResult): ExternalCommandError {
    const line = [command, ...args].join(' ')
    const detail = result.stderr.trim() || result.error?.message || ''
    const messages: Record<ExternalCommandErrorCode, string> = {
      ENOENT: `Command not found: '${command}'. Is it installed and on your PATH?`,
      EACCES: `Permission denied running '${command}'.`,
      NON_ZERO_EXIT: `'${line}' exited with status ${result.status}${detail ? `: ${detail}` : ''}`,
      SIGNALED: `'${line}' was terminated by ${result.signal}`,
      UNKNOWN: `'${line}' failed: ${detail || 'unknown error'}`,
    }
    const code = classifyResult(result)
    return new ExternalCommandError(code, command, args, result.status, messages[code])
  }

  static fromSpawnError(command: string, args: string[], error: NodeJS.ErrnoException): ExternalCommandError {
    return ExternalCommandError.fromResult(command, args, { status: null, signal: null, stdout: '', stderr: '', error })
  }
}

function classifyResult(result: CommandResult): ExternalCommandErrorCode {
  if (result.error) {
    if (result.error.code === 'ENOENT' || result.error.code === 'EACCES') {
      return result.error.code
    }
    return 'UNKNOWN'
  }
  if (result.signal) return 'SIGNALED'
  if (result.status !== 0) return 'NON_ZERO_EXIT'
  return 'UNKNOWN'
}

/**
 * Throws unless the command ran and exited with status 0.
 */
export function assertSucceeded(command: string, args: string[], result: CommandResult): void {
  if (result.error || result.signal || result.status !== 0) {
    throw ExternalCommandError.fromResult(command, args, result)
  }
}

export type SignalDeliveryErrorCode =
  | 'ESRCH' // No such process
  | 'EPERM' // Not allowed to signal it
  | 'UNKNOWN'

export class SignalDeliveryError extends Error {
  public readonly code: SignalDeliveryErrorCode
  public readonly processId: number

  constructor(code: SignalDeliveryErrorCode, processId: number, message: string) {
    super(message)
    this.name = 'SignalDeliveryError'
    this.code = code
    this.processId = processId
  }

  static fromErrno(processId: number, error: NodeJS.ErrnoException): SignalDeliveryError {
    const messages: Record<SignalDeliveryErrorCode, string> = {
      ESRCH: `No process with PID ${processId}. It may have already exited.`,
      EPERM: `Not permitted to signal PID ${processId}. Try running as the tunnel's owner.`,
      UNKNOWN: `Failed to signal PID ${processId}: ${error.message}`,
    }
    const code = error.code === 'ESRCH' || error.code === 'EPERM' ? error.code : 'UNKNOWN'
    return new SignalDeliveryError(code, processId, messages[code])
  }
}

/**
 * Raised from a prompt when the operator presses Ctrl+C or input ends.
 */
export class OperatorInterruptError extends Error {
  constructor() {
    super('Interrupted by operator')
    this.name = 'OperatorInterruptError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
