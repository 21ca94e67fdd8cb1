import { cancel } from "@clack/prompts"

import { CLI_SPEC } from "./spec.ts"
import { printHelpForPath } from "./help.ts"
import {
  CliUsageError,
  collectAllowedOptionNames,
  hasHandler,
  parseCliArgv,
  parseOptionsForCommand,
  parsePositionalsForCommand,
  resolveCommand
} from "./command.ts"
import { stderrChannel } from "../optspec/channel.ts"
import { logger } from "../ui/logger.ts"

import type { CliIo } from "./command.ts"

export const processIo: CliIo = {
  stdout: text => {
    process.stdout.write(text)
  },
  stderr: stderrChannel
}

export async function runCli(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const cli = CLI_SPEC
  try {
    const parsed = parseCliArgv(cli, argv)

    if (parsed.values["version"] === true) {
      io.stdout(`${cli.name} v${cli.version}\n`)
      return 0
    }

    if (parsed.values["help"] === true) {
      printHelpForPath(cli, parsed.positionals, io)
      return 0
    }

    const resolved = resolveCommand(cli, parsed.positionals)
    if (!resolved.command || !hasHandler(resolved.command)) {
      printHelpForPath(cli, [], io)
      return 1
    }

    const allowed = collectAllowedOptionNames(resolved.command)
    const disallowed = Object.keys(parsed.values).filter(k => !allowed.has(k))
    if (disallowed.length > 0) {
      throw new CliUsageError(
        `Option(s) not valid for "${resolved.command.name}": ${disallowed.map(o => `--${o}`).join(", ")}`
      )
    }

    const options = parseOptionsForCommand(resolved.command.options, parsed.values)
    const positionals = parsePositionalsForCommand(
      resolved.command.positionals,
      resolved.remainingPositionals
    )

    return await resolved.command.handler({
      ctx: { cli, io },
      args: { options, positionals }
    })
  } catch (error: unknown) {
    if (error instanceof CliUsageError) {
      logger.error({ message: error.message })
      printHelpForPath(cli, [], io)
      return 1
    }

    const message = error instanceof Error ? error.message : "Unknown error"
    cancel(message)
    if (error instanceof Error && error.stack) {
      logger.error({ message: error.stack })
    }
    return 1
  }
}
