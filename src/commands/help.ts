import { printHelpForPath } from "../cli/help.ts"
import { defineCommand, withHandler } from "../cli/command.ts"

import type { CommandHandlerFor } from "../cli/command.ts"

const helpPositionals = [{ name: "command", required: false }] as const

const helpSpec = defineCommand({
  name: "help",
  summary: "Show help for a command (e.g. optscope help check)",
  options: [],
  positionals: helpPositionals
} as const)

const handleHelp: CommandHandlerFor<typeof helpSpec> = async ({ ctx, args }): Promise<number> => {
  const name = args.positionals.command
  printHelpForPath(ctx.cli, name === undefined ? [] : [name], ctx.io)
  return 0
}

export const helpCommand = withHandler(helpSpec, handleHelp)
