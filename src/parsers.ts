import type { ParseResult, PersistentDefinition, RunningTunnel, TunnelKind } from './types.js'

export const UNKNOWN_PORT = 'Unknown'
export const UNNAMED = 'Unnamed'

// Interpreters that run the tunnel binary as a script, e.g. `python3 /usr/local/bin/pitunnel`
const INTERPRETER = /^(python[\d.]*|node|perl|ruby)$/

// USER PID %CPU %MEM VSZ RSS TTY STAT START TIME COMMAND
const PS_FIELD_COUNT = 11
const PS_PID_FIELD = 1
const PS_STAT_FIELD = 7

export interface ProcessTableFilter {
  binary: string
  managerName: string
  ownProcessId: number
}

/**
 * Split on runs of whitespace into at most `limit` fields, the last of which
 * keeps the remainder of the line verbatim.
 */
export function splitFields(line: string, limit: number): string[] {
  const fields: string[] = []
  let rest = line.trimStart()

  while (rest.length > 0 && fields.length < limit - 1) {
    const match = /\s+/.exec(rest)
    if (!match) break
    fields.push(rest.slice(0, match.index))
    rest = rest.slice(match.index + match[0].length)
  }
  if (rest.length > 0) {
    fields.push(rest.trimEnd())
  }
  return fields
}

function basename(token: string): string {
  const slash = token.lastIndexOf('/')
  return slash === -1 ? token : token.slice(slash + 1)
}

export function extractPort(command: string): string {
  return /--port=(\d+)/.exec(command)?.[1] ?? UNKNOWN_PORT
}

export function extractName(command: string): string {
  return /--name=([^ ]+)/.exec(command)?.[1] ?? UNNAMED
}

export function classifyKind(command: string): TunnelKind {
  return command.includes('--http') ? 'HTTP' : 'Custom'
}

/**
 * True when the command runs the tunnel binary itself: either the first token
 * is the binary, or an interpreter whose script is the binary.
 */
export function invokesBinary(command: string, binary: string): boolean {
  const tokens = command.split(/\s+/).filter(Boolean)
  if (tokens.length === 0) return false

  const program = basename(tokens[0])
  if (program === binary) return true
  if (!INTERPRETER.test(program)) return false

  const script = tokens.slice(1).find((token) => !token.startsWith('-'))
  return script !== undefined && basename(script) === binary
}

/**
 * True when the command is this manager, e.g. `node .../bin/tunnel-menu.js`.
 * Arguments such as `--name=tunnel-menu-demo` do not count.
 */
export function isManager(command: string, managerName: string): boolean {
  return command
    .split(/\s+/)
    .filter((token) => !token.startsWith('-'))
    .some((token) => basename(token).startsWith(managerName))
}

/**
 * Parse `ps aux` output into running tunnels.
 */
export function parseProcessTable(output: string, filter: ProcessTableFilter): ParseResult<RunningTunnel> {
  const items: RunningTunnel[] = []

  for (const line of output.split('\n')) {
    const fields = splitFields(line, PS_FIELD_COUNT)
    if (fields.length < PS_FIELD_COUNT) continue

    const command = fields[PS_FIELD_COUNT - 1]
    const processId = Number(fields[PS_PID_FIELD])
    if (!Number.isInteger(processId)) continue
    if (processId === filter.ownProcessId || isManager(command, filter.managerName)) continue
    if (fields[PS_STAT_FIELD].includes('Z') || command.includes('<defunct>')) continue
    if (!invokesBinary(command, filter.binary)) continue

    items.push({
      processId,
      port: extractPort(command),
      name: extractName(command),
      kind: classifyKind(command),
      rawCommand: command,
    })
  }

  if (items.length === 0) {
    return { kind: 'empty', reason: `no ${filter.binary} processes in process table` }
  }
  return { kind: 'parsed', items }
}

function isBorder(line: string): boolean {
  return line.trimStart().startsWith('+')
}

function tableCells(line: string): string[] {
  const cells = line.split('|').map((cell) => cell.trim())
  // drop the empty cells outside the outer borders
  if (cells.length > 0 && cells[0] === '') cells.shift()
  if (cells.length > 0 && cells[cells.length - 1] === '') cells.pop()
  return cells
}

/**
 * Parse the bordered table printed by the tunnel binary's `--status` query:
 *
 * ```
 * +------+------+------+------+
 * | PID  | Port | Type | Name |
 * +------+------+------+------+
 * | 4242 | 8080 | http | blog |
 * +------+------+------+------+
 * ```
 *
 * A fifth column, when present, holds the process command line.
 */
export function parseStatusTable(output: string, binary: string): ParseResult<RunningTunnel> {
  const lines = output.split('\n')
  const headerIndex = lines.findIndex((line) => tableCells(line).some((cell) => cell.toUpperCase() === 'PID'))
  if (headerIndex === -1) {
    return { kind: 'empty', reason: 'status output has no PID header' }
  }

  const items: RunningTunnel[] = []
  for (const line of lines.slice(headerIndex + 1)) {
    if (isBorder(line) || !line.includes('|')) continue

    const cells = tableCells(line)
    if (cells.length < 4) continue

    const [pidCell, portCell, typeCell, nameCell, commandCell] = cells
    if (!/^\d+$/.test(pidCell)) continue

    const port = portCell || UNKNOWN_PORT
    const name = nameCell && nameCell !== '-' ? nameCell : UNNAMED
    const kind: TunnelKind = /http/i.test(typeCell) ? 'HTTP' : 'Custom'
    items.push({
      processId: Number(pidCell),
      port,
      name,
      kind,
      rawCommand: commandCell || rebuildCommand(binary, port, kind, name),
    })
  }

  if (items.length === 0) {
    return { kind: 'empty', reason: 'status table has no data rows' }
  }
  return { kind: 'parsed', items }
}

function rebuildCommand(binary: string, port: string, kind: TunnelKind, name: string): string {
  const parts = [binary, `--port=${port}`]
  if (kind === 'HTTP') parts.push('--http')
  if (name !== UNNAMED) parts.push(`--name=${name}`)
  return parts.join(' ')
}

/**
 * Parse the bordered table printed by the tunnel binary's `--list` query.
 * Column 1 is the stored id, column 2 the saved arguments.
 */
export function parseRegistryTable(output: string): ParseResult<PersistentDefinition> {
  const items: PersistentDefinition[] = []
  let inTable = false

  for (const line of output.trim().split('\n')) {
    if (line.includes('| ID |')) {
      inTable = true
      continue
    }
    if (!inTable || isBorder(line) || !line.includes('|')) continue

    const parts = line.split('|')
    if (parts.length < 3) continue

    const id = parts[1].trim()
    if (!id) continue
    items.push({ id, rawArgs: parts[2].trim() })
  }

  if (!inTable) {
    return { kind: 'empty', reason: 'list output has no ID header' }
  }
  if (items.length === 0) {
    return { kind: 'empty', reason: 'no persistent tunnels in list output' }
  }
  return { kind: 'parsed', items }
}
