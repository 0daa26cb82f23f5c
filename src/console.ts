import * as readline from 'node:readline/promises'
import { setTimeout as sleep } from 'node:timers/promises'
import { OperatorInterruptError } from './error.js'
import type { OperatorConsole } from './types.js'

/**
 * Operator console on a readline interface. Ctrl+C or end of input aborts the
 * pending prompt with an OperatorInterruptError.
 */
export class TerminalConsole implements OperatorConsole {
  private rl: readline.Interface
  private aborter = new AbortController()

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = readline.createInterface({ input: this.input, output: this.output })
    this.rl.on('SIGINT', () => this.aborter.abort())
    this.rl.on('close', () => this.aborter.abort())
  }

  async ask(question: string): Promise<string> {
    if (this.aborter.signal.aborted) {
      throw new OperatorInterruptError()
    }
    try {
      return await this.rl.question(question, { signal: this.aborter.signal })
    } catch (error) {
      if (this.aborter.signal.aborted) {
        throw new OperatorInterruptError()
      }
      throw error
    }
  }

  /**
   * Make the pending or next prompt raise an OperatorInterruptError.
   */
  interrupt(): void {
    this.aborter.abort()
  }

  print(message = ''): void {
    this.output.write(`${message}\n`)
  }

  warn(message: string): void {
    console.error(message)
  }

  clear(): void {
    // move to top-left, clear screen and scrollback
    this.output.write('\x1b[H\x1b[2J\x1b[3J')
  }

  delay(ms: number): Promise<void> {
    return sleep(ms)
  }

  close(): void {
    this.rl.close()
  }
}
