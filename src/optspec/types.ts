export type Flag = 0 | 1

export type BindingValue = Flag | string

export type Bindings = Readonly<Record<string, BindingValue>>

export type OptionKind = "flag" | "valued"

export interface OptionDecl {
  readonly id: string
  readonly kind: OptionKind
  readonly defaultValue: BindingValue
  readonly description?: string
}

export interface ArgBounds {
  readonly min: number
  readonly max: number | null
}

/** Raw bound as a caller passes it: a count, its decimal text, or nothing. */
export type BoundInput = number | string | undefined

export type Prettify<T> = { [K in keyof T]: T[K] } & {}

type Digit = "0" | "1" | "2" | "3" | "4" | "5" | "6" | "7" | "8" | "9"

type OptstringIds<S extends string> =
  S extends `${infer C}${infer Rest}` ? (C extends ":" ? never : C) | OptstringIds<Rest> : never

type ValuedOptstringIds<S extends string> =
  S extends `${infer C}${infer Rest}` ?
    | (C extends ":" | Digit ? never
      : Rest extends `:${string}` ? C
      : never)
    | ValuedOptstringIds<Rest>
  : never

type BindingsFor<Ids extends string, Valued extends string> = Prettify<{
  readonly [K in Ids]: K extends Valued ? string : Flag
}>

/**
 * Binding record inferred from a literal optstring, e.g. `"ab:"` gives
 * `{ a: Flag; b: string }`. Digits stay flags even when marked. A non-literal
 * string falls back to {@link Bindings}.
 */
export type OptstringBindings<S extends string> =
  string extends S ? Bindings
  : S extends `:${infer Rest}` ? BindingsFor<OptstringIds<Rest>, ValuedOptstringIds<Rest>>
  : BindingsFor<OptstringIds<S>, ValuedOptstringIds<S>>

export interface OptionDeclInput {
  readonly id: string
  readonly takesValue?: boolean
  /** Shown by `explain`; has no effect on parsing. */
  readonly description?: string
}

type ValuedDeclIds<D> =
  D extends { readonly id: infer I extends string; readonly takesValue: true } ?
    I extends Digit ? never
    : I
  : never

export type SchemaBindings<O extends readonly OptionDeclInput[]> = BindingsFor<
  O[number]["id"],
  ValuedDeclIds<O[number]>
>
