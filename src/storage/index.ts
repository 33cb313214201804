export type { DatabaseConnection } from './interface.js'
export { SqliteConnection } from './connection.js'
export type { ConnectionOptions } from './connection.js'
