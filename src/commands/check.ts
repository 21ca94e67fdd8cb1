import { defineCommand, withHandler } from "../cli/command.ts"
import { optJson, optMax, optMin, optUsage } from "../cli/options.ts"
import { compileOptstring } from "../optspec/compile.ts"
import { runPlan } from "../optspec/engine.ts"

import type { CommandHandlerFor } from "../cli/command.ts"

const options = [optMin, optMax, optUsage, optJson] as const
const positionals = [
  {
    name: "optstring",
    required: true,
    description: "Accepted options, e.g. ab:v (a ':' after a letter means it takes a value)"
  },
  { name: "args", multiple: true, description: "Arguments to parse; pass them after --" }
] as const

const spec = defineCommand({
  name: "check",
  summary: "Parse arguments against an optstring and print the bindings",
  description: "Exits 2 with the parse diagnostics on stderr when the arguments do not fit.",
  options,
  positionals
} as const)

const handleCheck: CommandHandlerFor<typeof spec> = async ({ ctx, args }): Promise<number> => {
  const plan = compileOptstring(args.positionals.optstring, args.options.min, args.options.max)
  const outcome = runPlan(plan, args.positionals.args, {
    usage: args.options.usage,
    channel: ctx.io.stderr
  })
  if (!outcome.ok) return outcome.status

  if (args.options.json) {
    const payload = { options: outcome.options, positionals: outcome.positionals }
    ctx.io.stdout(`${JSON.stringify(payload, null, 2)}\n`)
    return 0
  }

  const lines: string[] = []
  if (plan.status === "ready") {
    for (const opt of plan.options) lines.push(`${opt.id}=${outcome.options[opt.id] ?? ""}`)
  }
  for (const value of outcome.positionals) lines.push(`arg: ${value}`)
  if (lines.length > 0) ctx.io.stdout(`${lines.join("\n")}\n`)
  return 0
}

export const checkCommand = withHandler(spec, handleCheck)
