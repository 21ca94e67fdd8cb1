import { defineOption } from "./command.ts"

export const optMin = defineOption({
  name: "min",
  type: "string",
  long: "--min",
  valueHint: "<n>",
  description: "Minimum number of positional arguments (default 0)"
} as const)

export const optMax = defineOption({
  name: "max",
  type: "string",
  long: "--max",
  valueHint: "<n>",
  description: "Maximum number of positional arguments (default unbounded)"
} as const)

export const optUsage = defineOption({
  name: "usage",
  type: "string",
  long: "--usage",
  valueHint: "<text>",
  description: "Usage text printed after any parse error"
} as const)

export const optJson = defineOption({
  name: "json",
  type: "boolean",
  long: "--json",
  description: "Output JSON (machine-readable)"
} as const)
