import { expect, test } from "vitest"

import { collectingChannel } from "../src/optspec/channel.ts"
import { compileOptstring } from "../src/optspec/compile.ts"
import { runPlan } from "../src/optspec/engine.ts"
import { renderPlan } from "../src/commands/explain.ts"
import { compileOptSpec, defineOptSpec, toOptstring } from "../src/optspec/schema.ts"

import type { Flag } from "../src/optspec/types.ts"

const archiveSpec = defineOptSpec({
  options: [{ id: "v" }, { id: "o", takesValue: true }, { id: "0" }],
  minArgs: 1
})

test("toOptstring renders declarations in order", () => {
  expect(toOptstring(archiveSpec.options)).toBe("vo:0")
  expect(toOptstring([])).toBe("")
})

test("a typed spec compiles to the same plan as its optstring", () => {
  expect(compileOptSpec(archiveSpec)).toEqual(compileOptstring("vo:0", 1))
})

test("typed spec bindings flow through the engine", () => {
  const outcome = runPlan(compileOptSpec(archiveSpec), ["-v0", "-o", "out.tar", "src"], {
    channel: collectingChannel()
  })
  expect(outcome.ok).toBe(true)
  if (!outcome.ok) return

  const verbose: Flag = outcome.options.v
  const output: string = outcome.options.o
  expect(verbose).toBe(1)
  expect(output).toBe("out.tar")
  expect(outcome.options["0"]).toBe(1)
  expect(outcome.positionals).toEqual(["src"])
})

test("ids must be a single letter or digit", () => {
  const spec = defineOptSpec({ options: [{ id: "a" }, { id: "ab" }] })
  expect(compileOptSpec(spec)).toEqual({
    status: "invalid",
    diagnostics: ["Invalid option spec: options.1.id: id must be a single letter or digit"]
  })
})

test("duplicate ids share one binding, valued when any is", () => {
  const spec = defineOptSpec({ options: [{ id: "a" }, { id: "a", takesValue: true }] })
  const plan = compileOptSpec(spec)
  expect(plan).toEqual(compileOptstring("aa:"))
  expect(plan.status === "ready" && plan.defaults).toEqual({ a: "" })
})

test("a digit id that asks for a value stays a flag", () => {
  const spec = defineOptSpec({ options: [{ id: "1", takesValue: true }] })
  const outcome = runPlan(compileOptSpec(spec), ["-1", "x"], { channel: collectingChannel() })
  expect(outcome.ok).toBe(true)
  if (!outcome.ok) return

  const one: Flag = outcome.options["1"]
  expect(one).toBe(1)
  expect(outcome.positionals).toEqual(["x"])
})

test("descriptions are carried onto the plan's declarations", () => {
  const spec = defineOptSpec({
    options: [
      { id: "v", description: "verbose output" },
      { id: "o", takesValue: true, description: "output file" },
      { id: "v", description: "ignored" },
      { id: "q" }
    ]
  })
  const plan = compileOptSpec(spec)
  expect(plan.status === "ready" && plan.options).toEqual([
    { id: "v", kind: "flag", defaultValue: 0, description: "verbose output" },
    { id: "o", kind: "valued", defaultValue: "", description: "output file" },
    { id: "q", kind: "flag", defaultValue: 0 }
  ])
  if (plan.status !== "ready") return
  expect(renderPlan(plan)).toEqual([
    'v  flag    default=0  verbose output',
    'o  valued  default=""  output file',
    "q  flag    default=0",
    "bounds: min=0 max=none"
  ])
})

test("bound problems surface from a typed spec too", () => {
  const spec = defineOptSpec({ options: [{ id: "a" }], minArgs: "x" })
  expect(compileOptSpec(spec)).toEqual({
    status: "invalid",
    diagnostics: ["Invalid minimum argument count: x"]
  })
})
