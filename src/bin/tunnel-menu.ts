#!/usr/bin/env node

import * as fs from 'node:fs'
import * as path from 'node:path'
import { fileURLToPath } from 'node:url'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { DEFAULT_CONFIG } from '../config.js'
import { TerminalConsole } from '../console.js'
import tunnelMenu from '../index.js'

// Get package.json version (ESM compatible)
const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)
const packagePath = path.join(__dirname, '..', '..', 'package.json')
const packageJson = JSON.parse(fs.readFileSync(packagePath, 'utf8'))
const { version } = packageJson

function nonNegativeInteger(name: string) {
  return (value: number) => {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`${name} must be a non-negative integer (milliseconds)`)
    }
    return value
  }
}

const args = yargs(hideBin(process.argv))
  .usage('Usage: tunnel-menu [options]\n\nInteractive menu for running and persistent tunnels.')
  .env('TUNNEL_MENU') // Use TUNNEL_MENU_ prefix for environment variables
  .option('b', {
    alias: 'binary',
    describe: 'Tunnel binary to query and launch',
    type: 'string',
    default: DEFAULT_CONFIG.binary,
  })
  .option('settle-delay', {
    describe: 'Milliseconds to wait between removing and relaunching during reload',
    type: 'number',
    default: DEFAULT_CONFIG.settleDelayMs,
    coerce: nonNegativeInteger('settle-delay'),
  })
  .option('launch-delay', {
    describe: 'Milliseconds between relaunches during reload',
    type: 'number',
    default: DEFAULT_CONFIG.launchDelayMs,
    coerce: nonNegativeInteger('launch-delay'),
  })
  .option('notice-delay', {
    describe: 'Milliseconds a status message stays on screen',
    type: 'number',
    default: DEFAULT_CONFIG.noticeDelayMs,
    coerce: nonNegativeInteger('notice-delay'),
  })
  .strict()
  .help('help', 'Show this help and exit')
  .version(version)

;(async () => {
  const argv = await args.argv

  if (process.env.DEBUG) {
    console.log(`Debug logging enabled: ${process.env.DEBUG}`)
  }

  const io = new TerminalConsole()

  // A SIGINT between prompts lets the running operation finish; the menu exits at its next prompt
  process.on('SIGINT', () => io.interrupt())

  try {
    const menu = tunnelMenu({
      io,
      binary: argv.b,
      settleDelayMs: argv['settle-delay'],
      launchDelayMs: argv['launch-delay'],
      noticeDelayMs: argv['notice-delay'],
    })
    await menu.run()
    io.close()
    process.exit(0)
  } catch (error) {
    io.close()
    console.error('❌ Tunnel menu failed:')
    if (error instanceof Error) {
      console.error(`   ${error.message}`)
      if (process.env.DEBUG) {
        console.error('Error stack:', error.stack)
      }
    } else {
      console.error(`   ${error}`)
    }
    process.exit(1)
  }
})()
