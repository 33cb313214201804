export { Statement } from './statement.js'
export type { RunResult } from './statement.js'
export { TypedResultView, RowCursor } from './result.js'
export {
  StatementError,
  PrepareError,
  BindError,
  StepError,
  IterationProtocolError,
  toEngineCode,
} from './errors.js'
export type { StatementErrorCode, EngineCode } from './errors.js'
export { param, toParameter, describeValue } from './values.js'
export { coerceColumn } from './coerce.js'
