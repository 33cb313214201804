import { Command } from 'commander'
import { registerExecCommand } from './commands/exec.js'
import { registerQueryCommand } from './commands/query.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('sqlstep')
    .description('Run typed prepared statements against a SQLite database')
    .version('0.1.0')

  registerExecCommand(program)
  registerQueryCommand(program)

  return program
}
