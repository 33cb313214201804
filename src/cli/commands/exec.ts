import type { Command } from 'commander'
import type { ParameterValue } from '../../types/values.js'
import { collectParameter } from '../params.js'
import { withConnection } from '../connect.js'
import { output } from '../output.js'

interface ExecOptions {
  param: ParameterValue[]
  config?: string
}

/**
 * Register the `exec` command on the Commander program.
 *
 * Binds the given parameters, runs the statement to completion and reports
 * how many rows it changed.
 */
export function registerExecCommand(program: Command): void {
  program
    .command('exec')
    .description('Execute a statement that returns no rows')
    .argument('<database>', 'SQLite database file, or :memory:')
    .argument('<sql>', 'a single SQL statement')
    .option('-p, --param <kind:value>', 'bind the next parameter (repeatable)', collectParameter, [])
    .option('--config <path>', 'configuration file path')
    .action((database: string, sql: string, options: ExecOptions) => {
      withConnection(database, options.config, (connection) => {
        const statement = connection.prepareStatement(sql).bind(...options.param)
        statement.executeAndReset()
        output.success(`${statement.lastRun?.changes ?? 0} row(s) changed`)
      })
    })
}
