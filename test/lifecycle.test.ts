import { expect } from 'chai'
import { beforeEach, describe, it } from 'mocha'
import { OperatorInterruptError } from '../src/error.js'
import {
  buildCreateArgs,
  createTunnel,
  type LifecycleContext,
  relaunchArgs,
  reloadAll,
  removeTunnel,
} from '../src/lifecycle.js'
import type { RunningTunnel } from '../src/types.js'
import { FakeConsole, FakeRunner, REGISTRY_TABLE, TEST_CONFIG, failed, ok } from './fakes.js'

function contextFor(runner: FakeRunner, io: FakeConsole): LifecycleContext {
  return { runner, io, config: TEST_CONFIG }
}

describe('buildCreateArgs', () => {
  it('should include only the flags that were chosen', () => {
    expect(buildCreateArgs({ port: '8080', kind: 'Custom', persist: false })).to.deep.equal(['--port=8080'])
    expect(buildCreateArgs({ port: '8080', kind: 'HTTP', name: 'blog', persist: true })).to.deep.equal([
      '--port=8080',
      '--http',
      '--name=blog',
      '--persist',
    ])
  })
})

describe('createTunnel', () => {
  let runner: FakeRunner

  beforeEach(() => {
    runner = new FakeRunner()
  })

  it('should re-prompt for a non-numeric port and then launch', async () => {
    const io = new FakeConsole(['abc', '8080', '', 'blog', 'n', 'y'])

    const created = await createTunnel(contextFor(runner, io))

    expect(created).to.be.true
    expect(io.output.filter((line) => line === 'Please enter a valid port number.')).to.have.length(1)
    expect(io.output).to.include('pitunnel --port=8080 --http --name=blog')
    expect(runner.lines('launch')).to.deep.equal(['pitunnel --port=8080 --http --name=blog'])
    expect(io.output).to.include('\nTunnel created successfully!')
    expect(io.delays).to.deep.equal([2000])
  })

  it('should never launch while the port is invalid', async () => {
    const io = new FakeConsole(['abc'])

    let caught: unknown
    try {
      await createTunnel(contextFor(runner, io))
    } catch (error) {
      caught = error
    }

    expect(caught).to.be.instanceOf(OperatorInterruptError)
    expect(runner.calls).to.deep.equal([])
    expect(io.questions).to.deep.equal(['Local port to expose: ', 'Local port to expose: '])
  })

  it('should cancel without side effects when not confirmed', async () => {
    const io = new FakeConsole(['8080', '2', '', 'y', 'n'])

    const created = await createTunnel(contextFor(runner, io))

    expect(created).to.be.false
    expect(io.output).to.include('pitunnel --port=8080 --persist')
    expect(io.output).to.include('\nTunnel creation cancelled.')
    expect(runner.calls).to.deep.equal([])
  })

  it('should report a launch failure and keep going', async () => {
    runner.failLaunch('pitunnel --port=8080 --http')
    const io = new FakeConsole(['8080', '1', '', 'n', 'y', ''])

    const created = await createTunnel(contextFor(runner, io))

    expect(created).to.be.false
    expect(io.output).to.include("\nError creating tunnel: Command not found: 'pitunnel'. Is it installed and on your PATH?")
    expect(io.questions[io.questions.length - 1]).to.equal('Press Enter to continue...')
  })
})

describe('removeTunnel', () => {
  const tunnels: RunningTunnel[] = [
    { processId: 4242, port: '8080', name: 'foo', kind: 'HTTP', rawCommand: 'pitunnel --port=8080 --http --name=foo' },
    { processId: 4343, port: '5000', name: 'Unnamed', kind: 'Custom', rawCommand: 'pitunnel --port=5000' },
  ]
  let runner: FakeRunner

  beforeEach(() => {
    runner = new FakeRunner().respond('pitunnel --list', ok(REGISTRY_TABLE))
  })

  it('should cancel on 0 without any external call', async () => {
    const io = new FakeConsole(['0'])

    await removeTunnel(contextFor(runner, io), tunnels)

    expect(runner.calls).to.deep.equal([])
  })

  it('should report when there is nothing to remove', async () => {
    const io = new FakeConsole([''])

    await removeTunnel(contextFor(runner, io), [])

    expect(io.output).to.deep.equal(['\nNo active tunnels to remove.'])
    expect(runner.calls).to.deep.equal([])
  })

  it('should remove and stop a persistent tunnel', async () => {
    runner.respond('pitunnel --remove 1', ok('')).respond('pitunnel --stop --port=8080', ok(''))
    const io = new FakeConsole(['1', 'y'])

    await removeTunnel(contextFor(runner, io), tunnels)

    expect(io.questions[1]).to.equal('Tunnel #1 (PID 4242, Port 8080) is persistent. Remove permanently? (y/n): ')
    expect(runner.lines('run')).to.deep.equal(['pitunnel --list', 'pitunnel --remove 1', 'pitunnel --stop --port=8080'])
    expect(runner.lines('terminate')).to.deep.equal([])
    expect(io.output).to.deep.equal([
      'Persistent tunnel (ID 1) has been removed.',
      'Tunnel on port 8080 has been stopped.',
    ])
  })

  it('should signal the process when stopping by port fails', async () => {
    runner.respond('pitunnel --remove 1', ok(''))
    const io = new FakeConsole(['1', 'y'])

    await removeTunnel(contextFor(runner, io), tunnels)

    expect(runner.lines('terminate')).to.deep.equal(['4242'])
    expect(io.output).to.include('Tunnel with PID 4242 has been terminated.')
  })

  it('should report a failed registry removal and not stop anything', async () => {
    runner.respond('pitunnel --remove 1', failed(3, 'no such id'))
    const io = new FakeConsole(['1', 'y', ''])

    await removeTunnel(contextFor(runner, io), tunnels)

    expect(runner.lines('run')).to.deep.equal(['pitunnel --list', 'pitunnel --remove 1'])
    expect(runner.lines('terminate')).to.deep.equal([])
    expect(io.output).to.deep.equal(["Error removing tunnel: 'pitunnel --remove 1' exited with status 3: no such id"])
  })

  it('should re-prompt on bad selections and terminate a transient tunnel', async () => {
    const io = new FakeConsole(['abc', '3', '2', 'y'])

    await removeTunnel(contextFor(runner, io), tunnels)

    expect(io.output.slice(0, 2)).to.deep.equal(['Please enter a valid number.', 'Invalid selection. Please try again.'])
    expect(io.questions[3]).to.equal('Are you sure you want to terminate tunnel #2 (PID 4343)? (y/n): ')
    expect(runner.lines('run')).to.deep.equal(['pitunnel --list'])
    expect(runner.lines('terminate')).to.deep.equal(['4343'])
  })

  it('should report a signal delivery failure', async () => {
    runner.failTerminate(4343, 'ESRCH')
    const io = new FakeConsole(['2', 'y', ''])

    await removeTunnel(contextFor(runner, io), tunnels)

    expect(io.output).to.deep.equal(['Error removing tunnel: No process with PID 4343. It may have already exited.'])
    expect(io.questions[2]).to.equal('Press Enter to continue...')
  })

  it('should leave the tunnel alone when not confirmed', async () => {
    const io = new FakeConsole(['2', 'n'])

    await removeTunnel(contextFor(runner, io), tunnels)

    expect(io.output).to.deep.equal(['Operation cancelled.'])
    expect(runner.lines('terminate')).to.deep.equal([])
  })
})

describe('relaunchArgs', () => {
  it('should append --persist when missing', () => {
    expect(relaunchArgs({ id: '1', rawArgs: ' --port=8080   --http ' })).to.deep.equal(['--port=8080', '--http', '--persist'])
    expect(relaunchArgs({ id: '2', rawArgs: '--port=81 --persist' })).to.deep.equal(['--port=81', '--persist'])
  })
})

describe('reloadAll', () => {
  it('should do nothing when no persistent tunnels exist', async () => {
    const runner = new FakeRunner().respond('pitunnel --list', ok('No persistent tunnels.'))
    const io = new FakeConsole([''])

    const outcomes = await reloadAll(contextFor(runner, io))

    expect(outcomes).to.deep.equal([])
    expect(runner.lines('run')).to.deep.equal(['pitunnel --list'])
    expect(runner.lines('launch')).to.deep.equal([])
    expect(io.output).to.deep.equal(['\nNo persistent tunnels configured.'])
  })

  it('should remove every definition and relaunch each one', async () => {
    const runner = new FakeRunner()
      .respond('pitunnel --list', ok(REGISTRY_TABLE))
      .respond('pitunnel --remove 1', failed(1, 'busy'))
      .respond('pitunnel --remove 2', ok(''))
    const io = new FakeConsole(['y', ''])

    const outcomes = await reloadAll(contextFor(runner, io))

    expect(io.questions[0]).to.equal('\nReload all 2 persistent tunnel(s)? (y/n): ')
    expect(runner.lines('run')).to.deep.equal(['pitunnel --list', 'pitunnel --remove 1', 'pitunnel --remove 2'])
    expect(runner.lines('launch')).to.deep.equal([
      'pitunnel --port=8080 --name=foo --persist',
      'pitunnel --port=9090 --persist',
    ])
    expect(io.delays).to.deep.equal([2000, 1000])
    expect(outcomes).to.deep.equal([
      { id: '1', removed: false, relaunched: true, error: "'pitunnel --remove 1' exited with status 1: busy" },
      { id: '2', removed: true, relaunched: true },
    ])
    expect(io.output.slice(-2)).to.deep.equal(['  1: remove failed, relaunched', '  2: removed, relaunched'])
  })

  it('should keep going when a relaunch fails', async () => {
    const runner = new FakeRunner()
      .respond('pitunnel --list', ok(REGISTRY_TABLE))
      .respond('pitunnel --remove 1', ok(''))
      .respond('pitunnel --remove 2', ok(''))
      .failLaunch('pitunnel --port=8080 --name=foo --persist')
    const io = new FakeConsole(['y', ''])

    const outcomes = await reloadAll(contextFor(runner, io))

    expect(runner.lines('launch')).to.have.length(2)
    expect(outcomes).to.deep.equal([
      {
        id: '1',
        removed: true,
        relaunched: false,
        error: "Command not found: 'pitunnel'. Is it installed and on your PATH?",
      },
      { id: '2', removed: true, relaunched: true },
    ])
  })

  it('should keep both errors when remove and relaunch fail for one tunnel', async () => {
    const runner = new FakeRunner()
      .respond('pitunnel --list', ok(REGISTRY_TABLE))
      .respond('pitunnel --remove 1', failed(1, 'busy'))
      .respond('pitunnel --remove 2', ok(''))
      .failLaunch('pitunnel --port=8080 --name=foo --persist')
    const io = new FakeConsole(['y', ''])

    const outcomes = await reloadAll(contextFor(runner, io))

    expect(outcomes[0]).to.deep.equal({
      id: '1',
      removed: false,
      relaunched: false,
      error:
        "'pitunnel --remove 1' exited with status 1: busy; Command not found: 'pitunnel'. Is it installed and on your PATH?",
    })
    expect(io.output).to.include('  1: remove failed, relaunch failed')
  })

  it('should change nothing when not confirmed', async () => {
    const runner = new FakeRunner().respond('pitunnel --list', ok(REGISTRY_TABLE))
    const io = new FakeConsole(['n'])

    const outcomes = await reloadAll(contextFor(runner, io))

    expect(outcomes).to.deep.equal([])
    expect(runner.lines('run')).to.deep.equal(['pitunnel --list'])
    expect(runner.lines('launch')).to.deep.equal([])
    expect(io.output[io.output.length - 1]).to.equal('Reload cancelled.')
  })
})
