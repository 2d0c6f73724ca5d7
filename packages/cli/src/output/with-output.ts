import { Command } from 'commander'
import type { AnyCommandResult, OutputOptions } from './types.js'
import { defaultOutputOptions, render, renderError, toCommandError } from './render.js'
import { resolveOutputOptions } from './options.js'

// commander passes the Command as the last action argument
function commandOf(args: readonly unknown[]): Command | undefined {
  const last = args[args.length - 1]
  return last instanceof Command ? last : undefined
}

/**
 * Turns a command handler into a commander action. The handler returns data;
 * this prints it in the format the global flags ask for. A thrown error is
 * printed to stderr and leaves exit code 1.
 */
export function withOutput<T, Args extends unknown[]>(
  handler: (...args: Args) => Promise<AnyCommandResult<T>>
): (...args: Args) => Promise<void> {
  return async (...args) => {
    const command = commandOf(args)
    let output: OutputOptions = defaultOutputOptions
    try {
      output = resolveOutputOptions(command ? command.optsWithGlobals() : {})
      const text = render(await handler(...args), output)
      if (text) process.stdout.write(`${text}\n`)
    } catch (error) {
      process.stderr.write(`${renderError(toCommandError(error), output)}\n`)
      process.exitCode = 1
    }
  }
}
