import { log as clackLog } from "@clack/prompts"

import { LOGGER_ENV_VAR } from "../constants.ts"

export type LogLevel = "debug" | "info" | "warn" | "error" | "success" | "step"

export type LogFieldValue = string | number | boolean
export type LogFields = Readonly<Record<string, LogFieldValue>>

export interface LogInput {
  readonly message: string
  readonly fields?: LogFields
}

export interface Logger {
  debug(input: LogInput): void
  info(input: LogInput): void
  warn(input: LogInput): void
  error(input: LogInput): void
  success(input: LogInput): void
  step(input: LogInput): void
}

export type LoggerBackend = "clack" | "console"

export function resolveBackend(
  env: NodeJS.ProcessEnv = process.env,
  isTty: boolean = process.stderr.isTTY === true
): LoggerBackend {
  const raw = (env[LOGGER_ENV_VAR] ?? "").trim().toLowerCase()
  if (raw === "clack") return "clack"
  if (raw === "console" || raw === "plain") return "console"
  return isTty ? "clack" : "console"
}

export function formatFieldsInline(fields: LogFields | undefined): string {
  if (!fields) return ""
  const parts: string[] = []
  for (const key of Object.keys(fields).sort()) {
    parts.push(`${key}=${String(fields[key])}`)
  }
  return parts.length > 0 ? ` (${parts.join(", ")})` : ""
}

function logWithClack(level: LogLevel, { message, fields }: LogInput): void {
  const line = `${message}${formatFieldsInline(fields)}`

  if (level === "debug" || level === "info") clackLog.info(line)
  else if (level === "warn") clackLog.warn(line)
  else if (level === "error") clackLog.error(line)
  else if (level === "success") clackLog.success(line)
  else clackLog.step(line)
}

export function formatConsoleLine(level: LogLevel, { message, fields }: LogInput): string {
  return `${level.toUpperCase()}: ${message}${formatFieldsInline(fields)}\n`
}

function logWithConsole(level: LogLevel, input: LogInput): void {
  process.stderr.write(formatConsoleLine(level, input))
}

export const logger: Logger = (() => {
  const emit = (level: LogLevel, input: LogInput) => {
    if (resolveBackend() === "console") return logWithConsole(level, input)
    return logWithClack(level, input)
  }

  return {
    debug: input => emit("debug", input),
    info: input => emit("info", input),
    warn: input => emit("warn", input),
    error: input => emit("error", input),
    success: input => emit("success", input),
    step: input => emit("step", input)
  } satisfies Logger
})()
