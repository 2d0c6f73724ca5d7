import { Command } from 'commander'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError } from '@agentlink/sdk'
import {
  createOutputOptions,
  render,
  renderError,
  resolveOutputOptions,
  toCommandError,
  withOutput,
  type CommandError,
  type ListResult,
  type OutputSchema,
  type SingleResult,
} from '../src/output/index.js'

interface Row {
  id: string
  name: string | null
  active: boolean
}

const schema: OutputSchema<Row> = {
  idField: 'id',
  columns: [
    { header: 'ID', field: 'id', width: 4 },
    { header: 'ACTIVE', field: 'active', width: 6 },
    { header: 'NAME', field: 'name' },
  ],
}

const alpha: Row = { id: 'a', name: 'Alpha', active: true }
const rows: Row[] = [alpha, { id: 'bcdef', name: null, active: false }]

const plain = createOutputOptions({ noColor: true })

describe('render', () => {
  it('renders lists as aligned tables', () => {
    expect(render({ type: 'list', data: rows, schema }, plain)).toBe(
      ['ID    ACTIVE  NAME', 'a     yes     Alpha', 'bcd…  no      -'].join('\n')
    )
  })

  it('omits the header row with noHeaders', () => {
    expect(render({ type: 'list', data: rows, schema }, { ...plain, noHeaders: true })).toBe(
      ['a     yes     Alpha', 'bcd…  no      -'].join('\n')
    )
  })

  it('prints only ids when quiet', () => {
    expect(render({ type: 'list', data: rows, schema }, { ...plain, quiet: true })).toBe('a\nbcdef')
  })

  it('renders a single result as key/value lines', () => {
    expect(render({ type: 'single', data: alpha, schema }, plain)).toBe(
      ['ID      a', 'ACTIVE  yes', 'NAME    Alpha'].join('\n')
    )
  })

  it('renders JSON, through serialize when the schema has one', () => {
    expect(render({ type: 'list', data: rows, schema }, { ...plain, format: 'json' })).toBe(
      JSON.stringify(rows, null, 2)
    )
    const serialized: OutputSchema<Row> = { ...schema, serialize: () => ({ count: 2 }) }
    expect(render({ type: 'list', data: rows, schema: serialized }, { ...plain, format: 'json' })).toBe(
      '{\n  "count": 2\n}'
    )
  })
})

describe('errors', () => {
  it('maps thrown values to command errors', () => {
    const commandError: CommandError = { code: 'NO_SESSIONS', message: 'none' }

    expect(toCommandError(commandError)).toBe(commandError)
    expect(toCommandError(new ConfigurationError('bad option'))).toEqual({
      code: 'CONFIGURATION',
      message: 'bad option',
    })
    expect(toCommandError(new Error('boom'))).toEqual({ code: 'UNKNOWN_ERROR', message: 'boom' })
    expect(toCommandError('plain')).toEqual({ code: 'UNKNOWN_ERROR', message: 'plain' })
  })

  it('renders errors as text or JSON', () => {
    const error: CommandError = { code: 'MISSING_PROMPT', message: 'A prompt is required', details: 'Usage: x' }

    expect(renderError(error, plain)).toBe('Error: A prompt is required\nUsage: x')
    expect(renderError(error, { ...plain, format: 'json' })).toBe(JSON.stringify({ error }, null, 2))
  })
})

describe('resolveOutputOptions', () => {
  it('reads the global flags', () => {
    expect(resolveOutputOptions({ json: true, headers: false, color: false })).toEqual({
      format: 'json',
      quiet: false,
      noHeaders: true,
      noColor: true,
    })
    expect(resolveOutputOptions({}).format).toBe('table')
    expect(resolveOutputOptions({ format: ' JSON ' }).format).toBe('json')
    expect(resolveOutputOptions({ quiet: true }).quiet).toBe(true)
  })

  it('rejects unknown formats', () => {
    let caught: unknown
    try {
      resolveOutputOptions({ format: 'yaml' })
    } catch (error) {
      caught = error
    }

    expect(caught).toEqual({
      code: 'INVALID_FORMAT',
      message: 'Unsupported output format: yaml',
      details: 'Supported formats: table, json',
    })
  })
})

describe('withOutput', () => {
  afterEach(() => {
    vi.restoreAllMocks()
    process.exitCode = undefined
  })

  it('writes the rendered result to stdout', async () => {
    const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    const command = new Command().option('--json')
    command.parse(['--json'], { from: 'user' })

    const action = withOutput(
      async (_command: Command): Promise<SingleResult<Row>> => ({ type: 'single', data: alpha, schema })
    )
    await action(command)

    expect(stdout).toHaveBeenCalledWith(
      JSON.stringify({ id: 'a', name: 'Alpha', active: true }, null, 2) + '\n'
    )
    expect(process.exitCode).toBeUndefined()
  })

  it('reports failures on stderr and sets the exit code', async () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const command = new Command().option('--no-color')
    command.parse(['--no-color'], { from: 'user' })

    const action = withOutput(async (_command: Command): Promise<ListResult<Row>> => {
      const error: CommandError = { code: 'NO_SESSIONS', message: 'The server has no stored sessions' }
      throw error
    })
    await action(command)

    expect(stderr).toHaveBeenCalledWith('Error: The server has no stored sessions\n')
    expect(process.exitCode).toBe(1)
  })
})
