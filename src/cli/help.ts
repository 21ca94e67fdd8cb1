import { builtinOptions, renderArgsFromPositionals, resolveCommand } from "./command.ts"

import type { AnyCommandSpec, CliIo, CliSpec, OptionSpec } from "./command.ts"

export function renderHelpForPath(cli: CliSpec, positionals: readonly string[]): string {
  const resolved = resolveCommand(cli, positionals)
  return resolved.command ? renderCommandHelp(cli, resolved.command) : renderRootHelp(cli)
}

export function printHelpForPath(cli: CliSpec, positionals: readonly string[], io: CliIo): void {
  const text = renderHelpForPath(cli, positionals)
  io.stdout(text.endsWith("\n") ? text : `${text}\n`)
}

function renderRootHelp(cli: CliSpec): string {
  const lines: string[] = []

  lines.push(`${cli.name} v${cli.version} - ${cli.summary}`)
  lines.push("")
  lines.push("Usage:")
  lines.push(`  ${cli.name} <command> [options]`)
  lines.push("")

  const entries = [...cli.commands]
    .map(cmd => ({ invocation: buildInvocation(cli.name, cmd), summary: cmd.summary }))
    .sort((a, b) => a.invocation.localeCompare(b.invocation))
  lines.push("Commands:")
  lines.push(...renderColumns(entries.map(e => [e.invocation, e.summary] as const)))
  lines.push("")

  lines.push("Global options:")
  lines.push(...renderOptionLines(builtinOptions()))
  lines.push("")
  lines.push("Tip:")
  lines.push("  Use `--help` after any command to see command-specific help.")
  lines.push("")

  return lines.join("\n")
}

function renderCommandHelp(cli: CliSpec, command: AnyCommandSpec): string {
  const lines: string[] = []

  const invocation = buildInvocation(cli.name, command)
  lines.push(`${invocation} - ${command.summary}`)
  lines.push("")
  lines.push("Usage:")
  lines.push(`  ${invocation} [options]`)
  lines.push("")

  if (command.description) {
    lines.push(command.description)
    lines.push("")
  }

  const described = command.positionals.filter(p => p.description)
  if (described.length > 0) {
    lines.push("Arguments:")
    lines.push(...renderColumns(described.map(p => [p.name, p.description ?? ""] as const)))
    lines.push("")
  }

  lines.push("Options:")
  lines.push(...renderOptionLines([...command.options, ...builtinOptions()]))
  lines.push("")

  return lines.join("\n")
}

function buildInvocation(cliName: string, cmd: AnyCommandSpec): string {
  const args = renderArgsFromPositionals(cmd.positionals)
  const base = `${cliName} ${cmd.name}`
  return args ? `${base} ${args}` : base
}

function renderOptionLines(options: readonly OptionSpec[]): string[] {
  return renderColumns(options.map(formatOption))
}

function renderColumns(rows: readonly (readonly [left: string, right: string])[]): string[] {
  const width = Math.max(...rows.map(([left]) => left.length), 0)
  return rows.map(([left, right]) => `  ${padRight(left, width + 2)}${right}`)
}

function formatOption(o: OptionSpec): readonly [left: string, right: string] {
  const names = o.short ? `${o.long}, ${o.short}` : o.long
  const hint = o.type === "boolean" ? "" : ` ${o.valueHint ?? "<value>"}`
  return [`${names}${hint}`, o.description]
}

function padRight(text: string, width: number): string {
  return text.length >= width ? text : text + " ".repeat(width - text.length)
}
