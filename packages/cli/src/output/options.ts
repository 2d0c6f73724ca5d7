import type { CommandError, OutputFormat, OutputOptions } from './types.js'
import { defaultOutputOptions } from './render.js'

const FORMATS: readonly OutputFormat[] = ['table', 'json']

/** Flags as commander hands them over; `--no-x` arrives as `x: false`. */
export interface CommandOptions {
  format?: unknown
  json?: unknown
  quiet?: unknown
  headers?: unknown
  color?: unknown
  [key: string]: unknown
}

function parseFormat(raw: unknown): OutputFormat {
  const wanted = typeof raw === 'string' ? raw.trim().toLowerCase() : raw
  const format = FORMATS.find((candidate) => candidate === wanted)
  if (format) return format

  const error: CommandError = {
    code: 'INVALID_FORMAT',
    message: `Unsupported output format: ${String(raw)}`,
    details: `Supported formats: ${FORMATS.join(', ')}`,
  }
  throw error
}

export function resolveOutputOptions(flags: CommandOptions): OutputOptions {
  return {
    format: flags.json === true ? 'json' : parseFormat(flags.format ?? defaultOutputOptions.format),
    quiet: flags.quiet === true,
    noHeaders: flags.headers === false,
    noColor: flags.color === false,
  }
}

export function createOutputOptions(partial: Partial<OutputOptions> = {}): OutputOptions {
  return { ...defaultOutputOptions, ...partial }
}
