import { Type, type Static } from '@sinclair/typebox'

export const JournalMode = Type.Union([
  Type.Literal('wal'),
  Type.Literal('delete'),
  Type.Literal('truncate'),
  Type.Literal('memory'),
  Type.Literal('off'),
])
export type JournalMode = Static<typeof JournalMode>

export const LogLevel = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
  Type.Literal('silent'),
])
export type LogLevel = Static<typeof LogLevel>

/** sqlstep configuration schema for sqlstep.config.json */
export const SqlstepConfigSchema = Type.Object({
  database: Type.Object({
    path: Type.String({ minLength: 1, default: ':memory:' }),
    readonly: Type.Boolean({ default: false }),
    fileMustExist: Type.Boolean({ default: false }),
    journalMode: JournalMode,
    foreignKeys: Type.Boolean({ default: true }),
    busyTimeoutMs: Type.Integer({ minimum: 0, default: 5000 }),
  }),
  logging: Type.Object({
    level: LogLevel,
    path: Type.Optional(Type.String({ minLength: 1 })),
  }),
})

export type SqlstepConfig = Static<typeof SqlstepConfigSchema>
export type DatabaseConfig = SqlstepConfig['database']
export type LoggingConfig = SqlstepConfig['logging']
