import { silentChannel } from "./channel.ts"
import { compileOptstring } from "./compile.ts"
import { runPlan } from "./engine.ts"
import { compileOptSpec } from "./schema.ts"

import type { ParseOutcome, ParseSuccess, RunOptions } from "./engine.ts"
import type { OptSpec } from "./schema.ts"
import type { BoundInput, OptionDeclInput, OptstringBindings, SchemaBindings } from "./types.ts"

export interface ParseOptsOptions extends RunOptions {
  readonly minArgs?: BoundInput
  readonly maxArgs?: BoundInput
}

/** Compile `optstring` and run it against `argv` in one call. */
export function parseOpts<const S extends string>(
  optstring: S,
  argv: readonly string[],
  opts: ParseOptsOptions = {}
): ParseOutcome<OptstringBindings<S>> {
  const plan = compileOptstring(optstring, opts.minArgs, opts.maxArgs)
  return runPlan(plan, argv, { usage: opts.usage, channel: opts.channel })
}

/**
 * Like {@link parseOpts} but throws the {@link OptionUsageError} instead of
 * returning it. Diagnostics are not written anywhere unless a channel is given.
 */
export function parseOptsOrThrow<const S extends string>(
  optstring: S,
  argv: readonly string[],
  opts: ParseOptsOptions = {}
): ParseSuccess<OptstringBindings<S>> {
  const outcome = parseOpts(optstring, argv, { ...opts, channel: opts.channel ?? silentChannel })
  if (!outcome.ok) throw outcome.error
  return outcome
}

export interface RoutineInput<B> {
  readonly opts: B
  readonly args: readonly string[]
}

export type RoutineBody<B> = (input: RoutineInput<B>) => number

/** A routine that takes its raw argument vector and returns an exit status. */
export type Routine = (argv: readonly string[]) => number

export interface RoutineConfig<S extends string> extends ParseOptsOptions {
  readonly optstring: S
}

/**
 * Wrap `body` so each call parses its own argv first. A usage error returns
 * the reserved status without running `body`; otherwise `body` sees the
 * bindings and only the unconsumed positionals.
 */
export function withOpts<const S extends string>(
  config: RoutineConfig<S>,
  body: RoutineBody<OptstringBindings<S>>
): Routine {
  return argv => {
    const outcome = parseOpts(config.optstring, argv, config)
    if (!outcome.ok) return outcome.status
    return body({ opts: outcome.options, args: outcome.positionals })
  }
}

export function withOptSpec<const O extends readonly OptionDeclInput[]>(
  spec: OptSpec<O>,
  body: RoutineBody<SchemaBindings<O>>,
  opts: RunOptions = {}
): Routine {
  return argv => {
    const outcome = runPlan(compileOptSpec(spec), argv, opts)
    if (!outcome.ok) return outcome.status
    return body({ opts: outcome.options, args: outcome.positionals })
  }
}
