import { expect, test } from "vitest"

import { CLI_SPEC } from "../src/cli/spec.ts"
import {
  CliUsageError,
  collectAllowedOptionNames,
  parseCliArgv,
  parseOptionsForCommand,
  parsePositionalsForCommand,
  renderArgsFromPositionals,
  resolveCommand
} from "../src/cli/command.ts"
import { optJson, optMin } from "../src/cli/options.ts"

test("resolveCommand finds the command and remaining positionals", () => {
  const resolved = resolveCommand(CLI_SPEC, ["check", "ab:", "-a"])
  expect(resolved.command?.name).toBe("check")
  expect(resolved.remainingPositionals).toEqual(["ab:", "-a"])
})

test("resolveCommand returns null for an unknown command", () => {
  const resolved = resolveCommand(CLI_SPEC, ["nope", "x"])
  expect(resolved.command).toBeNull()
  expect(resolved.remainingPositionals).toEqual(["nope", "x"])
})

test("built-in options are always allowed for a command", () => {
  const check = resolveCommand(CLI_SPEC, ["check"]).command
  const allowed = collectAllowedOptionNames(check)
  expect([...allowed].sort()).toEqual(["help", "json", "max", "min", "usage", "version"])

  const explain = resolveCommand(CLI_SPEC, ["explain"]).command
  expect(collectAllowedOptionNames(explain).has("usage")).toBe(false)
})

test("parseCliArgv passes tokens after -- through as positionals", () => {
  const parsed = parseCliArgv(CLI_SPEC, ["check", "ab:", "--min", "1", "--", "-a", "--json"])
  expect(Object.keys(parsed.values)).toEqual(["min"])
  expect(parsed.values["min"]).toBe("1")
  expect(parsed.positionals).toEqual(["check", "ab:", "-a", "--json"])
})

test("parseCliArgv rejects options it does not know", () => {
  expect(() => parseCliArgv(CLI_SPEC, ["check", "a", "-a"])).toThrow(CliUsageError)
})

test("parseOptionsForCommand maps raw values by option name", () => {
  expect(parseOptionsForCommand([optMin, optJson] as const, { min: "2" })).toEqual({
    min: "2",
    json: false
  })
})

test("parsePositionalsForCommand throws on extra args", () => {
  expect(() =>
    parsePositionalsForCommand([{ name: "optstring", required: true }] as const, ["a", "b"])
  ).toThrow("Unexpected arguments: b")
})

test("parsePositionalsForCommand requires required args", () => {
  expect(() =>
    parsePositionalsForCommand([{ name: "optstring", required: true }] as const, [])
  ).toThrow("Missing required argument: optstring")
})

test("renderArgsFromPositionals marks required and repeated args", () => {
  const check = resolveCommand(CLI_SPEC, ["check"]).command
  expect(check && renderArgsFromPositionals(check.positionals)).toBe("<optstring> [args...]")
  expect(renderArgsFromPositionals([])).toBeUndefined()
})
