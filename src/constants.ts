/**
 * Exit status reserved for "bad invocation". Callers can tell a usage error
 * apart from every other failure by this value alone.
 */
export const USAGE_ERROR_STATUS = 2 as const

export const OPTSTRING_PATTERN = /^[a-zA-Z0-9:]*$/
export const OPTION_ID_PATTERN = /^[a-zA-Z0-9]$/
export const DIGIT_ID_PATTERN = /^[0-9]$/

export const VALUE_MARKER = ":" as const
export const END_OF_OPTIONS = "--" as const

export const FLAG_UNSET = 0 as const
export const FLAG_SET = 1 as const

export const LOGGER_ENV_VAR = "OPTSCOPE_LOGGER" as const
