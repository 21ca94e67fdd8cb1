import { defineCommand, withHandler } from "../cli/command.ts"
import { optJson, optMax, optMin } from "../cli/options.ts"
import { compileOptstring } from "../optspec/compile.ts"
import { runPlan } from "../optspec/engine.ts"

import type { CommandHandlerFor } from "../cli/command.ts"
import type { ReadyPlan } from "../optspec/compile.ts"

const options = [optMin, optMax, optJson] as const
const positionals = [{ name: "optstring", required: true }] as const

const spec = defineCommand({
  name: "explain",
  summary: "Show the bindings and defaults an optstring compiles to",
  options,
  positionals
} as const)

const handleExplain: CommandHandlerFor<typeof spec> = async ({ ctx, args }): Promise<number> => {
  const plan = compileOptstring(args.positionals.optstring, args.options.min, args.options.max)
  if (plan.status === "invalid") {
    // Running an invalid plan reports its diagnostics and yields the usage status.
    const outcome = runPlan(plan, [], { channel: ctx.io.stderr })
    return outcome.ok ? 0 : outcome.status
  }

  if (args.options.json) {
    const payload = { optstring: plan.optstring, options: plan.options, bounds: plan.bounds }
    ctx.io.stdout(`${JSON.stringify(payload, null, 2)}\n`)
    return 0
  }

  ctx.io.stdout(`${renderPlan(plan).join("\n")}\n`)
  return 0
}

export function renderPlan(plan: ReadyPlan): string[] {
  const lines = plan.options.map(o => {
    const line = `${o.id}  ${o.kind.padEnd(6)}  default=${JSON.stringify(o.defaultValue)}`
    return o.description ? `${line}  ${o.description}` : line
  })
  lines.push(`bounds: min=${plan.bounds.min} max=${plan.bounds.max ?? "none"}`)
  return lines
}

export const explainCommand = withHandler(spec, handleExplain)
