import { parseArgs } from "node:util"

import { isRecord, isStringArray } from "../lib/guards.ts"

import type { ErrorChannel } from "../optspec/channel.ts"
import type { Prettify } from "../optspec/types.ts"

export type OptionType = "boolean" | "string"

export interface OptionSpec<Name extends string = string> {
  readonly name: Name
  readonly type: OptionType
  readonly long: `--${string}`
  readonly short?: `-${string}`
  readonly valueHint?: string // e.g. "<n>"
  readonly description: string
}

export interface PositionalSpec<Name extends string = string> {
  readonly name: Name
  readonly required?: boolean
  readonly multiple?: boolean
  readonly description?: string
}

export interface CliIo {
  readonly stdout: (text: string) => void
  readonly stderr: ErrorChannel
}

export interface CliContext {
  readonly cli: CliSpec
  readonly io: CliIo
}

export type OptionValue<T extends OptionType> = T extends "boolean" ? boolean : string | undefined

export type OptionsValues<Opts extends readonly OptionSpec[]> = Prettify<
  {
    readonly [O in Opts[number] as O["name"]]: OptionValue<O["type"]>
  } & {}
>

type PosValueFromSpec<S extends PositionalSpec> =
  S extends { multiple: true } ? { readonly [K in S["name"]]: string[] }
  : S extends { required: true } ? { readonly [K in S["name"]]: string }
  : { readonly [K in S["name"]]: string | undefined }

type UnionToIntersection<U> =
  (U extends unknown ? (k: U) => void : never) extends (k: infer I) => void ? I : never

export type PositionalsValues<Pos extends readonly PositionalSpec[]> = Prettify<
  (Pos[number] extends never ? {} : UnionToIntersection<PosValueFromSpec<Pos[number]>>) & {}
>

export type CommandArgs<
  Opts extends readonly OptionSpec[],
  Pos extends readonly PositionalSpec[]
> = {
  readonly options: OptionsValues<Opts>
  readonly positionals: PositionalsValues<Pos>
}

export interface CommandSpec<
  Name extends string = string,
  Opts extends readonly OptionSpec[] = readonly [],
  Pos extends readonly PositionalSpec[] = readonly []
> {
  readonly name: Name
  readonly summary: string
  readonly description?: string
  readonly options: Opts
  readonly positionals: Pos
}

export type AnyCommandSpec = CommandSpec<string, readonly OptionSpec[], readonly PositionalSpec[]>

export interface CliSpec {
  readonly name: string
  readonly version: string
  readonly summary: string
  readonly commands: readonly AnyCommandSpec[]
}

export function defineOption<const O extends OptionSpec>(opt: O): O {
  return opt
}

export function defineCommand<const C extends AnyCommandSpec>(cmd: C): C {
  return cmd
}

export function defineCli<const C extends CliSpec>(cli: C): C {
  return cli
}

export type CommandHandlerFor<C extends AnyCommandSpec> = (input: {
  readonly ctx: CliContext
  readonly args: CommandArgs<C["options"], C["positionals"]>
}) => Promise<number>

export type CommandWithHandler<C extends AnyCommandSpec> = C & {
  readonly handler: CommandHandlerFor<C>
}

export function withHandler<const C extends AnyCommandSpec>(
  cmd: C,
  handler: CommandHandlerFor<C>
): CommandWithHandler<C> {
  return { ...cmd, handler }
}

export function hasHandler(cmd: AnyCommandSpec): cmd is CommandWithHandler<AnyCommandSpec> {
  return "handler" in cmd && typeof cmd.handler === "function"
}

const BUILTIN_HELP_OPTION = defineOption({
  name: "help",
  type: "boolean",
  long: "--help",
  short: "-h",
  description: "Show help"
} as const)

const BUILTIN_VERSION_OPTION = defineOption({
  name: "version",
  type: "boolean",
  long: "--version",
  short: "-v",
  description: "Show version"
} as const)

export function builtinOptions(): readonly OptionSpec[] {
  return [BUILTIN_HELP_OPTION, BUILTIN_VERSION_OPTION]
}

export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = "CliUsageError"
  }
}

export interface ResolvedCommand {
  readonly command: AnyCommandSpec | null
  readonly remainingPositionals: readonly string[]
}

export function resolveCommand(cli: CliSpec, positionals: readonly string[]): ResolvedCommand {
  const [first, ...rest] = positionals
  const command = first === undefined ? undefined : cli.commands.find(c => c.name === first)
  return command ?
      { command, remainingPositionals: rest }
    : { command: null, remainingPositionals: positionals }
}

export interface ParsedCliInvocation {
  readonly values: Record<string, unknown>
  readonly positionals: readonly string[]
}

/**
 * Parse argv against every option any command declares; per-command
 * filtering happens afterwards in {@link collectAllowedOptionNames}.
 * Tokens after `--` are passed through as positionals untouched.
 */
export function parseCliArgv(cli: CliSpec, argv: readonly string[]): ParsedCliInvocation {
  let parsed: unknown
  try {
    parsed = parseArgs({
      args: [...argv],
      options: buildUnionParseOptions(cli),
      strict: true,
      allowPositionals: true
    })
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Invalid arguments"
    throw new CliUsageError(message)
  }

  if (!isRecord(parsed)) return { values: {}, positionals: [] }
  const values = parsed["values"]
  const positionals = parsed["positionals"]

  return {
    values: isRecord(values) ? values : {},
    positionals: isStringArray(positionals) ? positionals : []
  }
}

function buildUnionParseOptions(
  cli: CliSpec
): Record<string, { type: "string" | "boolean"; short?: string }> {
  const out: Record<string, { type: "string" | "boolean"; short?: string }> = {}
  for (const opt of collectAllOptions(cli)) {
    const short = opt.short ? opt.short.replace(/^-/, "") : null
    out[longName(opt)] = short === null ? { type: opt.type } : { type: opt.type, short }
  }
  return out
}

function collectAllOptions(cli: CliSpec): readonly OptionSpec[] {
  return [...builtinOptions(), ...cli.commands.flatMap(c => c.options)]
}

function longName(opt: OptionSpec): string {
  return opt.long.replace(/^--/, "")
}

export function collectAllowedOptionNames(command: AnyCommandSpec | null): ReadonlySet<string> {
  const allowed = new Set<string>()
  for (const opt of builtinOptions()) allowed.add(longName(opt))
  if (command) for (const opt of command.options) allowed.add(longName(opt))
  return allowed
}

export function parseOptionsForCommand<Opts extends readonly OptionSpec[]>(
  opts: Opts,
  values: Record<string, unknown>
): OptionsValues<Opts> {
  const out: Record<string, unknown> = {}

  for (const opt of opts) {
    const raw = values[longName(opt)]
    out[opt.name] =
      opt.type === "boolean" ? raw === true
      : typeof raw === "string" ? raw
      : undefined
  }

  return out as OptionsValues<Opts>
}

export function parsePositionalsForCommand<Pos extends readonly PositionalSpec[]>(
  posSpecs: Pos,
  remaining: readonly string[]
): PositionalsValues<Pos> {
  const out: Record<string, unknown> = {}
  let idx = 0

  for (const spec of posSpecs) {
    if (spec.multiple) {
      out[spec.name] = remaining.slice(idx)
      idx = remaining.length
      continue
    }

    const value = remaining[idx]
    if (value === undefined) {
      if (spec.required) {
        throw new CliUsageError(`Missing required argument: ${spec.name}`)
      }
      out[spec.name] = undefined
      continue
    }

    out[spec.name] = value
    idx += 1
  }

  if (idx < remaining.length) {
    throw new CliUsageError(`Unexpected arguments: ${remaining.slice(idx).join(" ")}`)
  }

  return out as PositionalsValues<Pos>
}

export function renderArgsFromPositionals(pos: readonly PositionalSpec[]): string | undefined {
  if (pos.length === 0) return undefined
  return pos
    .map(p => {
      const name = p.multiple ? `${p.name}...` : p.name
      return p.required ? `<${name}>` : `[${name}]`
    })
    .join(" ")
}
