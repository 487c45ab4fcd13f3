export { expr } from './dsl/expr.js';
export { ChainBuilder, StrOps, ListOps, StructOps, toChain } from './dsl/builder.js';
export type { Operand } from './dsl/builder.js';
export { condition, evaluateCondition } from './conditions/conditions.js';
export type { Condition } from './conditions/conditions.js';
export { evaluateChain, evaluateExpression } from './expressions/evaluate.js';
export { applyOp } from './expressions/ops.js';
export { logicalNode, foldLogical } from './expressions/logical.js';
export type {
  ExpressionChain,
  ExpressionItem,
  OpItem,
  StrOp,
  ListOp,
  StructOp,
  LiteralValue,
} from './expressions/types.js';
export { DATA_TYPE_NAMES, toEngineDataType, fromEngineDataType } from './engine/datatypes.js';
export type { DataTypeName } from './engine/datatypes.js';
export type { SourceItem } from './sources/types.js';
export type { TransformItem } from './transforms/types.js';
export type { ExportItem } from './exports/types.js';
export type { Config, Loader, RunOptions } from './types.js';
export { loadSource } from './sources/load.js';
export { applyTransform } from './transforms/apply.js';
export { exportPlan } from './exports/export.js';
export { parseConfig, parseConfigDocument, readConfigFile } from './config/config.js';
export { loadLoader, loadConfig, loadConfigFile, runConfig } from './config/load.js';
export { serializeConfig, stringifyConfig } from './config/serialize.js';
export { inferSourceSchema, spliceSchema } from './config/infer.js';
export { configJsonSchema } from './config/json-schema.js';
export { createContext } from './context.js';
export type { ResolveContext, ContextOptions } from './context.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { loadSettings } from './settings.js';
export type { Settings } from './settings.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export {
  EtlError,
  PathError,
  ConfigValidationError,
  ArityError,
  InvalidPatternError,
  ConfigCycleError,
  NoExportsError,
  EngineError,
  ExportError,
} from './errors.js';
