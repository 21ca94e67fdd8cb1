import { z } from "zod"

import { OPTION_ID_PATTERN, VALUE_MARKER } from "../constants.ts"
import { asBindings } from "./bindings.ts"
import { compileOptstring } from "./compile.ts"
import { messages } from "./errors.ts"

import type { ParsePlan } from "./compile.ts"
import type { BoundInput, OptionDeclInput, SchemaBindings } from "./types.ts"

const OptionDeclSchema = z.object({
  id: z.string().regex(OPTION_ID_PATTERN, "id must be a single letter or digit"),
  takesValue: z.boolean().optional(),
  description: z.string().optional()
})

const OptionDeclListSchema = z.array(OptionDeclSchema)

export interface OptSpec<O extends readonly OptionDeclInput[] = readonly OptionDeclInput[]> {
  readonly options: O
  readonly minArgs?: BoundInput
  readonly maxArgs?: BoundInput
}

export function defineOptSpec<const O extends readonly OptionDeclInput[]>(
  spec: OptSpec<O>
): OptSpec<O> {
  return spec
}

export function toOptstring(options: readonly OptionDeclInput[]): string {
  return options.map(o => (o.takesValue ? `${o.id}${VALUE_MARKER}` : o.id)).join("")
}

/**
 * Compile a typed option spec. The declarations are checked, rendered to the
 * equivalent optstring and compiled through {@link compileOptstring}, so both
 * front doors share one set of rules. Descriptions are then attached to the
 * plan's declarations; the first one given for an id wins.
 */
export function compileOptSpec<const O extends readonly OptionDeclInput[]>(
  spec: OptSpec<O>
): ParsePlan<SchemaBindings<O>> {
  const parsed = OptionDeclListSchema.safeParse(spec.options)
  if (!parsed.success) {
    return {
      status: "invalid",
      diagnostics: parsed.error.issues.map(issue =>
        messages.invalidOptSpec(`${["options", ...issue.path].join(".")}: ${issue.message}`)
      )
    }
  }

  const plan = compileOptstring(toOptstring(parsed.data), spec.minArgs, spec.maxArgs)
  if (plan.status === "invalid") return plan

  const descriptions = new Map<string, string>()
  for (const decl of parsed.data) {
    if (decl.description !== undefined && !descriptions.has(decl.id)) {
      descriptions.set(decl.id, decl.description)
    }
  }

  return {
    ...plan,
    options: plan.options.map(opt => {
      const description = descriptions.get(opt.id)
      return description === undefined ? opt : { ...opt, description }
    }),
    defaults: asBindings<SchemaBindings<O>>(plan.defaults)
  }
}
