import { z } from "zod"

import pkg from "../../package.json"

import { defineCli } from "./command.ts"
import { checkCommand } from "../commands/check.ts"
import { explainCommand } from "../commands/explain.ts"
import { helpCommand } from "../commands/help.ts"
import { versionCommand } from "../commands/version.ts"

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string()
})

const packageJson = PackageJsonSchema.parse(pkg)

export const CLI_SPEC = defineCli({
  name: packageJson.name,
  version: packageJson.version,
  summary: "single-character option parsing for routines (optstring in, bindings out)",
  commands: [checkCommand, explainCommand, helpCommand, versionCommand]
} as const)
