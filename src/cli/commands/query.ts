import type { Command } from 'commander'
import { COLUMN_KINDS, type ColumnKind, type ParameterValue } from '../../types/values.js'
import { collectParameter, formatCell, parseColumns } from '../params.js'
import { withConnection } from '../connect.js'
import { output } from '../output.js'

interface QueryOptions {
  columns: ColumnKind[]
  param: ParameterValue[]
  config?: string
}

/**
 * Register the `query` command on the Commander program.
 *
 * Reads each row through a typed result view declared by --columns and
 * prints the rows as a table.
 */
export function registerQueryCommand(program: Command): void {
  program
    .command('query')
    .description('Run a query and print its rows as the declared column kinds')
    .argument('<database>', 'SQLite database file, or :memory:')
    .argument('<sql>', 'a single SQL query')
    .requiredOption(
      '-c, --columns <kinds>',
      `comma-separated column kinds (${COLUMN_KINDS.join(', ')})`,
      parseColumns,
    )
    .option('-p, --param <kind:value>', 'bind the next parameter (repeatable)', collectParameter, [])
    .option('--config <path>', 'configuration file path')
    .action((database: string, sql: string, options: QueryOptions) => {
      withConnection(database, options.config, (connection) => {
        const statement = connection.prepareStatement(sql).bind(...options.param)
        const names = statement.columnNames
        const header = options.columns.map((_, i) => names[i] ?? `col${i}`)

        const rows: string[][] = []
        for (const row of statement.executeQuery(...options.columns)) {
          rows.push(row.map(formatCell))
        }
        statement.reset()

        if (rows.length === 0) {
          output.info('(no rows)')
          return
        }
        output.table(header, rows)
      })
    })
}
