import { afterEach, expect, test, vi } from "vitest"

import {
  OptionUsageError,
  USAGE_ERROR_STATUS,
  collectingChannel,
  defineOptSpec,
  isOptionUsageError,
  parseOpts,
  parseOptsOrThrow,
  withOptSpec,
  withOpts
} from "../src/optspec/index.ts"

import type { Flag } from "../src/optspec/index.ts"

afterEach(() => {
  vi.restoreAllMocks()
})

test("parseOpts infers bindings from a literal optstring", () => {
  const outcome = parseOpts("vf:", ["-v", "-f", "notes.md", "rest"], {
    channel: collectingChannel()
  })
  expect(outcome.ok).toBe(true)
  if (!outcome.ok) return

  const typed: { readonly v: Flag; readonly f: string } = outcome.options
  expect(typed).toEqual({ v: 1, f: "notes.md" })
  expect(outcome.positionals).toEqual(["rest"])
})

test("parseOpts applies bounds and usage", () => {
  const channel = collectingChannel()
  const outcome = parseOpts("q", ["a", "b", "c"], { maxArgs: 2, usage: "tool [-q] [a] [b]", channel })
  expect(outcome.ok).toBe(false)
  expect(channel.lines).toEqual(["Too many arguments; maximum 2", "Usage: tool [-q] [a] [b]"])
})

test("parseOptsOrThrow throws the usage error without writing to stderr", () => {
  const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true)

  let caught: unknown
  try {
    parseOptsOrThrow("ab:", ["-z"])
  } catch (error: unknown) {
    caught = error
  }

  expect(isOptionUsageError(caught)).toBe(true)
  expect(caught).toBeInstanceOf(OptionUsageError)
  if (!(caught instanceof OptionUsageError)) return
  expect(caught.kind).toBe("unknown-option")
  expect(caught.message).toBe("Unknown option '-z'")
  expect(caught.exitCode).toBe(USAGE_ERROR_STATUS)
  expect(write).not.toHaveBeenCalled()
})

test("parseOptsOrThrow stays silent when the channel is passed as undefined", () => {
  const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true)

  expect(() => parseOptsOrThrow("a", ["-z"], { channel: undefined, usage: "demo [-a]" })).toThrow(
    OptionUsageError
  )
  expect(write).not.toHaveBeenCalled()
})

test("parseOptsOrThrow types a marked digit as a flag", () => {
  const { options } = parseOptsOrThrow("0:v", ["-0v", "x"])
  const typed: { readonly 0: Flag; readonly v: Flag } = options
  expect(typed).toEqual({ 0: 1, v: 1 })
})

test("parseOptsOrThrow returns the success result", () => {
  expect(parseOptsOrThrow("a", ["-a", "x"])).toEqual({
    ok: true,
    options: { a: 1 },
    positionals: ["x"],
    consumed: 1
  })
})

test("withOpts runs the body with bindings and leftover arguments", () => {
  const channel = collectingChannel()
  const seen: string[] = []
  const greet = withOpts(
    { optstring: "nf:", minArgs: 1, usage: "greet [-n] [-f name] <msg>", channel },
    ({ opts, args }) => {
      seen.push(`${opts.n}|${opts.f}|${args.join(",")}`)
      return opts.n === 1 ? 10 : 0
    }
  )

  expect(greet(["-n", "-f", "ada", "hi", "there"])).toBe(10)
  expect(greet(["hi"])).toBe(0)
  expect(seen).toEqual(["1|ada|hi,there", "0||hi"])
  expect(channel.lines).toEqual([])
})

test("withOpts returns the usage status without running the body", () => {
  const channel = collectingChannel()
  const body = vi.fn(() => 0)
  const greet = withOpts({ optstring: "n", minArgs: 1, usage: "greet <msg>", channel }, body)

  expect(greet([])).toBe(2)
  expect(greet(["-x", "msg"])).toBe(2)
  expect(body).not.toHaveBeenCalled()
  expect(channel.lines).toEqual([
    "Insufficient arguments; minimum 1",
    "Usage: greet <msg>",
    "Unknown option '-x'",
    "Usage: greet <msg>"
  ])
})

test("nested routines keep their own bindings", () => {
  const channel = collectingChannel()
  const inner = withOpts({ optstring: "a", channel }, ({ opts }) => opts.a)
  const outer = withOpts({ optstring: "ab", channel }, ({ opts, args }) => {
    const innerStatus = inner(args)
    return opts.a * 100 + opts.b * 10 + innerStatus
  })

  expect(outer(["-b", "--", "-a"])).toBe(11)
  expect(outer(["-a", "x"])).toBe(100)
})

test("withOptSpec binds a typed spec", () => {
  const channel = collectingChannel()
  const spec = defineOptSpec({ options: [{ id: "d", takesValue: true }], maxArgs: 0 })
  const cd = withOptSpec(spec, ({ opts }) => (opts.d === "/tmp" ? 0 : 1), { channel })

  expect(cd(["-d", "/tmp"])).toBe(0)
  expect(cd(["-d", "/var"])).toBe(1)
  expect(cd(["-d", "/tmp", "extra"])).toBe(2)
  expect(channel.lines).toEqual(["Too many arguments; maximum 0"])
})
