import { Command } from 'commander'
import { createRequire } from 'node:module'
import { runPingCommand } from './commands/ping.js'
import { runStatusCommand } from './commands/status.js'
import { runAuthCommand } from './commands/auth.js'
import { runModelsCommand } from './commands/models.js'
import { runRunCommand } from './commands/run.js'
import { createSessionsCommand } from './commands/sessions/index.js'
import { withOutput } from './output/index.js'

const require = createRequire(import.meta.url)

function resolveCliVersion(): string {
  const packageJson: unknown = require('../package.json')
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string' &&
    packageJson.version.trim().length > 0
  ) {
    return packageJson.version.trim()
  }
  throw new Error('Unable to resolve @agentlink/cli version from package.json.')
}

export function createCli(): Command {
  const program = new Command()

  program
    .name('agentlink')
    .description('Talk to an agent server from the command line')
    .version(resolveCliVersion(), '-v, --version', 'output the version number')
    // Connection options
    .option('--url <url>', 'Attach to a running server (host:port, port, or http://host:port)')
    .option('--cli-path <path>', 'Agent server executable to spawn (default: agent)')
    // Global output options
    .option('-o, --format <format>', 'output format: table, json', 'table')
    .option('--json', 'output in JSON format (alias for --format json)')
    .option('-q, --quiet', 'minimal output (IDs only)')
    .option('--no-headers', 'omit table headers')
    .option('--no-color', 'disable colored output')

  program
    .command('ping')
    .description('Check that the server answers')
    .argument('[message]', 'Text for the server to echo back')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runPingCommand))

  program
    .command('status')
    .description('Show server version and protocol compatibility')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runStatusCommand))

  program
    .command('auth')
    .description('Show how the server is authenticated')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runAuthCommand))

  program
    .command('models')
    .description('List models the server offers')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runModelsCommand))

  program.addCommand(createSessionsCommand())

  program
    .command('run')
    .description('Send a prompt in a new or resumed session and wait for the reply')
    .argument('<prompt>', 'The prompt to send')
    .option('--model <model>', 'Model for a new session')
    .option('--stream', 'Print the reply as it streams in')
    .option('--resume <id>', 'Continue a stored session (ID or unique prefix)')
    .option('--allow-all', 'Approve every permission request')
    .option('--timeout <ms>', 'Give up after this many milliseconds')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runRunCommand))

  return program
}
