import type { BindingValue, Bindings, OptionDecl } from "./types.ts"

export function defaultBindings(options: readonly OptionDecl[]): Record<string, BindingValue> {
  const out: Record<string, BindingValue> = {}
  for (const opt of options) out[opt.id] = opt.defaultValue
  return out
}

// The record is keyed by exactly the declared ids; B only narrows the value types.
export function asBindings<B>(values: Bindings): B {
  return values as B
}
