export * from './types.js'
export { render, renderError, toCommandError, defaultOutputOptions } from './render.js'
export { resolveOutputOptions, createOutputOptions, type CommandOptions } from './options.js'
export { withOutput } from './with-output.js'
