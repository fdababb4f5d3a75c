import { Cause, Predicate } from 'effect'

export type SerializableErrorSummary = {
  readonly name?: string
  readonly message: string
  readonly code?: string
  readonly hint?: string
}

export type CliExitCode = 0 | 1 | 2

export const isCliViolationCode = (code: string | undefined): boolean =>
  typeof code === 'string' && (code === 'CLI_VIOLATION' || code.startsWith('CLI_VIOLATION_'))

const usageCodes: ReadonlySet<string> = new Set([
  'CLI_INVALID_ARGUMENT',
  'CLI_INVALID_COMMAND',
  'CLI_MISSING_RUNID',
  'CLI_INVALID_INPUT',
  'TEMPLATE_CONFIG_MISSING',
  'TEMPLATE_CONFIG_INVALID',
  'SELECTION_UNKNOWN',
  'SYMBOL_NOT_FOUND',
])

export const isCliUsageCode = (code: string | undefined): boolean => typeof code === 'string' && usageCodes.has(code)

/** 2 for usage errors and violations, 1 for everything else. */
export const exitCodeFromErrorSummary = (error: SerializableErrorSummary | undefined): CliExitCode =>
  isCliViolationCode(error?.code) || isCliUsageCode(error?.code) ? 2 : 1

export class CliError extends Error {
  readonly code: string
  readonly hint?: string
  override readonly cause?: unknown

  constructor(params: { readonly code: string; readonly message: string; readonly hint?: string; readonly cause?: unknown }) {
    super(params.message)
    this.name = 'CliError'
    this.code = params.code
    this.hint = params.hint
    this.cause = params.cause
  }
}

export const makeCliError = (params: {
  readonly code: string
  readonly message: string
  readonly hint?: string
  readonly cause?: unknown
}): CliError => new CliError(params)

const truncate = (value: string, maxLen: number): string => (value.length <= maxLen ? value : value.slice(0, maxLen))

const stringProp = (value: unknown, key: string): string | undefined => {
  if (!Predicate.hasProperty(value, key)) return undefined
  const prop = value[key]
  return typeof prop === 'string' && prop.length > 0 ? prop : undefined
}

// A failed Effect surfaces as a Cause; the summary is built from its first failure.
const unwrapCause = (cause: unknown): unknown => {
  if (!Cause.isCause(cause)) return cause
  const failure = Cause.failureOption(cause)
  if (failure._tag === 'Some') return failure.value
  const defect = Cause.dieOption(cause)
  return defect._tag === 'Some' ? defect.value : cause
}

const getMessageFromUnknown = (cause: unknown): string => {
  if (typeof cause === 'string') return cause
  if (typeof cause === 'number' || typeof cause === 'boolean' || typeof cause === 'bigint') return String(cause)
  if (cause instanceof CliError && typeof cause.cause !== 'undefined') {
    const inner = getMessageFromUnknown(unwrapCause(cause.cause))
    return inner.length > 0 ? `${cause.message} | cause: ${inner}` : cause.message
  }
  if (cause instanceof Error) return cause.message || cause.name || 'Error'
  const message = stringProp(cause, 'message')
  if (message) return message
  if (Cause.isCause(cause)) {
    const pretty = Cause.pretty(cause, { renderErrorCause: true })
    if (pretty.length > 0) return pretty
  }
  return 'Unknown error'
}

export const asSerializableErrorSummary = (input: unknown): SerializableErrorSummary => {
  const cause = unwrapCause(input)
  const message = truncate(getMessageFromUnknown(cause), 512)

  if (cause && typeof cause === 'object') {
    const name = stringProp(cause, 'name')
    const code = stringProp(cause, 'code')
    const hint = stringProp(cause, 'hint')
    return {
      ...(name ? { name } : null),
      message,
      ...(code ? { code } : null),
      ...(hint ? { hint } : null),
    }
  }

  return { message }
}
