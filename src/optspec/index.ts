export { USAGE_ERROR_STATUS } from "../constants.ts"
export { collectingChannel, silentChannel, stderrChannel } from "./channel.ts"
export { compileOptstring, normalizeOptstring, resolveBounds } from "./compile.ts"
export { runPlan } from "./engine.ts"
export { OptionUsageError, isOptionUsageError } from "./errors.ts"
export { parseOpts, parseOptsOrThrow, withOptSpec, withOpts } from "./routine.ts"
export { compileOptSpec, defineOptSpec, toOptstring } from "./schema.ts"

export type { CollectingChannel, ErrorChannel } from "./channel.ts"
export type { InvalidPlan, ParsePlan, ReadyPlan } from "./compile.ts"
export type { ParseFailure, ParseOutcome, ParseSuccess, RunOptions, ScanState } from "./engine.ts"
export type { UsageErrorKind } from "./errors.ts"
export type {
  ParseOptsOptions,
  Routine,
  RoutineBody,
  RoutineConfig,
  RoutineInput
} from "./routine.ts"
export type { OptSpec } from "./schema.ts"
export type {
  ArgBounds,
  BindingValue,
  Bindings,
  BoundInput,
  Flag,
  OptionDecl,
  OptionDeclInput,
  OptionKind,
  OptstringBindings,
  SchemaBindings
} from "./types.ts"
