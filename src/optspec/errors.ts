import { USAGE_ERROR_STATUS } from "../constants.ts"

export type UsageErrorKind =
  | "malformed-spec"
  | "unknown-option"
  | "missing-value"
  | "too-few-arguments"
  | "too-many-arguments"

export class OptionUsageError extends Error {
  public readonly kind: UsageErrorKind
  public readonly diagnostics: readonly string[]
  public readonly exitCode = USAGE_ERROR_STATUS

  public constructor(opts: {
    readonly kind: UsageErrorKind
    readonly diagnostics: readonly string[]
  }) {
    super(opts.diagnostics[0] ?? "Usage error")
    this.name = "OptionUsageError"
    this.kind = opts.kind
    this.diagnostics = opts.diagnostics
  }
}

export function isOptionUsageError(error: unknown): error is OptionUsageError {
  return error instanceof OptionUsageError
}

export const messages = {
  invalidOptstring: (optstring: string) => `Invalid optstring: ${optstring}`,
  invalidOptSpec: (detail: string) => `Invalid option spec: ${detail}`,
  invalidMin: (raw: string) => `Invalid minimum argument count: ${raw}`,
  invalidMax: (raw: string) => `Invalid maximum argument count: ${raw}`,
  invertedBounds: (min: number, max: number) =>
    `Invalid argument bounds; minimum ${min} exceeds maximum ${max}`,
  unknownOption: (char: string) => `Unknown option '-${char}'`,
  missingValue: (char: string) => `Option '-${char}' requires an argument`,
  insufficientArgs: (min: number) => `Insufficient arguments; minimum ${min}`,
  tooManyArgs: (max: number) => `Too many arguments; maximum ${max}`,
  usage: (usage: string) => `Usage: ${usage}`
} as const
