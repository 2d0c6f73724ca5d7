import { Command } from 'commander'
import { runLsCommand } from './ls.js'
import { runRmCommand } from './rm.js'
import { runLastCommand } from './last.js'
import { withOutput } from '../../output/index.js'

export function createSessionsCommand(): Command {
  const sessions = new Command('sessions').description('Manage sessions stored on the agent server')

  sessions
    .command('ls')
    .description('List stored sessions, most recent first')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runLsCommand))

  sessions
    .command('rm')
    .description('Delete a stored session')
    .argument('<id>', 'Session ID (or unique prefix)')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runRmCommand))

  sessions
    .command('last')
    .description('Print the ID of the most recently used session')
    .option('--json', 'Output in JSON format')
    .action(withOutput(runLastCommand))

  return sessions
}
