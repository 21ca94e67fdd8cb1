import { END_OF_OPTIONS, FLAG_SET, USAGE_ERROR_STATUS } from "../constants.ts"
import { asBindings, defaultBindings } from "./bindings.ts"
import { stderrChannel } from "./channel.ts"
import { OptionUsageError, messages } from "./errors.ts"

import type { ErrorChannel } from "./channel.ts"
import type { ParsePlan, ReadyPlan } from "./compile.ts"
import type { UsageErrorKind } from "./errors.ts"
import type { BindingValue, Bindings, OptionDecl } from "./types.ts"

export interface RunOptions {
  /** Appended as `Usage: <usage>` after the diagnostics of any failure, when non-empty. */
  readonly usage?: string
  readonly channel?: ErrorChannel
}

export interface ParseSuccess<B> {
  readonly ok: true
  readonly options: B
  /** Unconsumed tokens, in their original order. */
  readonly positionals: readonly string[]
  /** Tokens used by the scan, `--` included. */
  readonly consumed: number
}

export interface ParseFailure {
  readonly ok: false
  readonly status: typeof USAGE_ERROR_STATUS
  readonly error: OptionUsageError
  readonly diagnostics: readonly string[]
}

export type ParseOutcome<B = Bindings> = ParseSuccess<B> | ParseFailure

export type ScanState = "scanning" | "stopped" | "done"

type ScanResult =
  | {
      readonly ok: true
      readonly values: Record<string, BindingValue>
      readonly index: number
    }
  | {
      readonly ok: false
      readonly kind: UsageErrorKind
      readonly message: string
    }

/**
 * Run a compiled plan against an argument vector.
 *
 * Writes every diagnostic line to the channel (stderr by default) and returns
 * them on the failure result as well. The plan and `argv` are never mutated.
 */
export function runPlan<B>(
  plan: ParsePlan<B>,
  argv: readonly string[],
  opts: RunOptions = {}
): ParseOutcome<B> {
  const channel = opts.channel ?? stderrChannel

  if (plan.status === "invalid") {
    return fail({ kind: "malformed-spec", lines: plan.diagnostics, usage: opts.usage, channel })
  }

  const scan = scanOptions(plan, argv)
  if (!scan.ok) {
    return fail({ kind: scan.kind, lines: [scan.message], usage: opts.usage, channel })
  }

  const positionals = argv.slice(scan.index)
  const { min, max } = plan.bounds

  if (positionals.length < min) {
    return fail({
      kind: "too-few-arguments",
      lines: [messages.insufficientArgs(min)],
      usage: opts.usage,
      channel
    })
  }

  if (max !== null && positionals.length > max) {
    return fail({
      kind: "too-many-arguments",
      lines: [messages.tooManyArgs(max)],
      usage: opts.usage,
      channel
    })
  }

  return {
    ok: true,
    options: asBindings<B>(scan.values),
    positionals,
    consumed: scan.index
  }
}

function scanOptions(plan: ReadyPlan<unknown>, argv: readonly string[]): ScanResult {
  const byId = new Map<string, OptionDecl>()
  for (const opt of plan.options) byId.set(opt.id, opt)

  const values = defaultBindings(plan.options)
  let state: ScanState = "scanning"
  let index = 0

  while (state !== "done") {
    if (state === "stopped") {
      state = "done"
      continue
    }

    const token = argv[index]

    if (token === undefined || !isOptionToken(token)) {
      state = "done"
      continue
    }

    if (token === END_OF_OPTIONS) {
      index += 1
      state = "stopped"
      continue
    }

    // A token may cluster several flags (`-ab`) and end in one valued option
    // whose argument is either the rest of the token or the next token.
    const chars = Array.from(token.slice(1))
    let used = 1
    for (let pos = 0; pos < chars.length; pos += 1) {
      const char = chars[pos] ?? ""
      const opt = byId.get(char)
      if (!opt) {
        return { ok: false, kind: "unknown-option", message: messages.unknownOption(char) }
      }

      if (opt.kind === "flag") {
        values[opt.id] = FLAG_SET
        continue
      }

      const attached = chars.slice(pos + 1).join("")
      if (attached.length > 0) {
        values[opt.id] = attached
        break
      }

      const next = argv[index + 1]
      if (next === undefined) {
        return { ok: false, kind: "missing-value", message: messages.missingValue(char) }
      }
      values[opt.id] = next
      used = 2
      break
    }

    index += used
  }

  return { ok: true, values, index }
}

function isOptionToken(token: string): boolean {
  return token.startsWith("-") && token.length > 1
}

function fail(input: {
  readonly kind: UsageErrorKind
  readonly lines: readonly string[]
  readonly usage: string | undefined
  readonly channel: ErrorChannel
}): ParseFailure {
  const diagnostics = [...input.lines]
  if (input.usage) diagnostics.push(messages.usage(input.usage))

  for (const line of diagnostics) input.channel.write(line)

  return {
    ok: false,
    status: USAGE_ERROR_STATUS,
    error: new OptionUsageError({ kind: input.kind, diagnostics }),
    diagnostics
  }
}
