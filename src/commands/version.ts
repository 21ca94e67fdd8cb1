import { defineCommand, withHandler } from "../cli/command.ts"

import type { CliContext } from "../cli/command.ts"

const versionSpec = defineCommand({
  name: "version",
  summary: "Print version",
  options: [],
  positionals: []
} as const)

async function handleVersion({ ctx }: { readonly ctx: CliContext }): Promise<number> {
  ctx.io.stdout(`${ctx.cli.name} v${ctx.cli.version}\n`)
  return 0
}

export const versionCommand = withHandler(versionSpec, handleVersion)
