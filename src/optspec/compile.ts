import {
  DIGIT_ID_PATTERN,
  FLAG_UNSET,
  OPTSTRING_PATTERN,
  VALUE_MARKER
} from "../constants.ts"
import { asBindings, defaultBindings } from "./bindings.ts"
import { messages } from "./errors.ts"

import type {
  ArgBounds,
  BoundInput,
  Bindings,
  OptionDecl,
  OptstringBindings
} from "./types.ts"

export interface ReadyPlan<B = Bindings> {
  readonly status: "ready"
  /** Normalized optstring (no leading silent-mode marker). */
  readonly optstring: string
  /** One declaration per identifier, in optstring order. */
  readonly options: readonly OptionDecl[]
  readonly bounds: ArgBounds
  readonly defaults: B
}

export interface InvalidPlan {
  readonly status: "invalid"
  readonly diagnostics: readonly string[]
}

export type ParsePlan<B = Bindings> = ReadyPlan<B> | InvalidPlan

export function normalizeOptstring(raw: string): string {
  return raw.startsWith(VALUE_MARKER) ? raw.slice(VALUE_MARKER.length) : raw
}

/**
 * Compile an optstring and positional bounds into a plan.
 *
 * Never throws: a malformed optstring or bound gives an {@link InvalidPlan},
 * which the engine turns into a usage error without touching any binding.
 */
export function compileOptstring<const S extends string>(
  optstring: S,
  minArgs?: BoundInput,
  maxArgs?: BoundInput
): ParsePlan<OptstringBindings<S>> {
  const normalized = normalizeOptstring(optstring)
  const diagnostics: string[] = []

  const options = declareOptions(normalized)
  if (!options) diagnostics.push(messages.invalidOptstring(normalized))

  const bounds = resolveBounds(minArgs, maxArgs)
  if (!bounds.ok) diagnostics.push(bounds.diagnostic)

  if (!options || !bounds.ok) {
    return { status: "invalid", diagnostics }
  }

  return {
    status: "ready",
    optstring: normalized,
    options,
    bounds: bounds.value,
    defaults: asBindings<OptstringBindings<S>>(defaultBindings(options))
  }
}

/**
 * Scans right to left so a marker is always credited to the identifier
 * directly before it. Returns null only for bad characters or `::`.
 *
 * The rest follows getopts: a marker with nothing before it is ignored, a
 * digit is always a flag whatever follows it, and a repeated identifier gets
 * one declaration at its first position, valued if any occurrence is marked.
 */
function declareOptions(optstring: string): OptionDecl[] | null {
  if (!OPTSTRING_PATTERN.test(optstring)) return null
  if (optstring.includes(`${VALUE_MARKER}${VALUE_MARKER}`)) return null

  const scanned: { readonly id: string; readonly marked: boolean }[] = []
  let markerPending = false

  for (let i = optstring.length - 1; i >= 0; i -= 1) {
    const char = optstring.charAt(i)
    if (char === VALUE_MARKER) {
      markerPending = true
      continue
    }

    scanned.push({ id: char, marked: markerPending && !DIGIT_ID_PATTERN.test(char) })
    markerPending = false
  }

  const valued = new Map<string, boolean>()
  for (const { id, marked } of scanned.reverse()) {
    valued.set(id, marked || valued.get(id) === true)
  }

  return Array.from(valued, ([id, isValued]): OptionDecl =>
    isValued ?
      { id, kind: "valued", defaultValue: "" }
    : { id, kind: "flag", defaultValue: FLAG_UNSET }
  )
}

type BoundReading =
  | { readonly kind: "absent" }
  | { readonly kind: "count"; readonly value: number }
  | { readonly kind: "invalid"; readonly raw: string }

function readBound(raw: BoundInput): BoundReading {
  if (raw === undefined) return { kind: "absent" }
  if (typeof raw === "number") {
    return Number.isSafeInteger(raw) && raw >= 0 ?
        { kind: "count", value: raw }
      : { kind: "invalid", raw: String(raw) }
  }

  const trimmed = raw.trim()
  if (trimmed.length === 0) return { kind: "absent" }
  if (!/^\d+$/.test(trimmed)) return { kind: "invalid", raw }

  const value = Number.parseInt(trimmed, 10)
  return Number.isSafeInteger(value) ? { kind: "count", value } : { kind: "invalid", raw }
}

export function resolveBounds(
  minArgs: BoundInput,
  maxArgs: BoundInput
):
  | { readonly ok: true; readonly value: ArgBounds }
  | { readonly ok: false; readonly diagnostic: string } {
  const min = readBound(minArgs)
  if (min.kind === "invalid") return { ok: false, diagnostic: messages.invalidMin(min.raw) }

  const max = readBound(maxArgs)
  if (max.kind === "invalid") return { ok: false, diagnostic: messages.invalidMax(max.raw) }

  const minValue = min.kind === "count" ? min.value : 0
  const maxValue = max.kind === "count" ? max.value : null

  if (maxValue !== null && minValue > maxValue) {
    return { ok: false, diagnostic: messages.invertedBounds(minValue, maxValue) }
  }

  return { ok: true, value: { min: minValue, max: maxValue } }
}
