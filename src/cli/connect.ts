import { loadConfig } from '../config/loader.js'
import { loggerFromConfig } from '../logging/logger.js'
import { SqliteConnection } from '../storage/connection.js'
import { output } from './output.js'

/**
 * Open `database` with the configured connection settings, run `fn`, and
 * close the connection. Any failure is reported on stderr and exits with 1.
 */
export function withConnection(
  database: string,
  configPath: string | undefined,
  fn: (connection: SqliteConnection) => void,
): void {
  let connection: SqliteConnection | undefined
  try {
    const config = loadConfig(configPath)
    connection = SqliteConnection.fromConfig(
      { ...config.database, path: database },
      loggerFromConfig(config.logging),
    )
    fn(connection)
  } catch (err) {
    output.error(err instanceof Error ? err.message : String(err))
    process.exit(1)
  } finally {
    connection?.close()
  }
}
