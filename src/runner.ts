import * as child_process from 'node:child_process'
import debug from 'debug'
import { ExternalCommandError, SignalDeliveryError } from './error.js'
import type { CommandResult, CommandRunner } from './types.js'

const log = debug('tunnel-menu:runner')

// ps aux on a busy host can exceed the 1MB default
const MAX_OUTPUT_BUFFER = 16 * 1024 * 1024

export class ChildProcessRunner implements CommandRunner {
  run(command: string, args: string[]): CommandResult {
    log('run: %s %o', command, args)
    const result = child_process.spawnSync(command, args, {
      encoding: 'utf8',
      maxBuffer: MAX_OUTPUT_BUFFER,
      stdio: ['ignore', 'pipe', 'pipe'],
    })
    log('exit status=%s signal=%s', result.status, result.signal)

    return {
      status: result.status,
      signal: result.signal,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      error: result.error,
    }
  }

  launch(command: string, args: string[]): Promise<void> {
    log('launch: %s %o', command, args)

    return new Promise((resolve, reject) => {
      const child = child_process.spawn(command, args, {
        detached: true,
        stdio: 'ignore',
      })

      child.once('spawn', () => {
        log('launched pid %d', child.pid)
        child.unref()
        resolve()
      })
      child.once('error', (error: NodeJS.ErrnoException) => {
        log('launch failed: %o', error)
        reject(ExternalCommandError.fromSpawnError(command, args, error))
      })
    })
  }

  terminate(processId: number): void {
    log('SIGTERM -> %d', processId)
    try {
      process.kill(processId, 'SIGTERM')
    } catch (error) {
      const nodeError: NodeJS.ErrnoException = error instanceof Error ? error : new Error(String(error))
      throw SignalDeliveryError.fromErrno(processId, nodeError)
    }
  }
}
