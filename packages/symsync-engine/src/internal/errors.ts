export type SymbolEngineErrorCode =
  | 'IO_FAILURE'
  | 'DUPLICATE_SYMBOL_NAME'
  | 'TEMPLATE_CONFIG_MISSING'
  | 'TEMPLATE_CONFIG_INVALID'
  | 'RENDER_FAILED'
  | 'SELECTION_UNKNOWN'
  | 'SYMBOL_NOT_FOUND'

export class SymbolEngineError extends Error {
  readonly code: SymbolEngineErrorCode
  readonly hint?: string
  override readonly cause?: unknown

  constructor(params: {
    readonly code: SymbolEngineErrorCode
    readonly message: string
    readonly hint?: string
    readonly cause?: unknown
  }) {
    super(params.message)
    this.name = 'SymbolEngineError'
    this.code = params.code
    this.hint = params.hint
    this.cause = params.cause
  }
}

export const makeSymbolEngineError = (params: {
  readonly code: SymbolEngineErrorCode
  readonly message: string
  readonly hint?: string
  readonly cause?: unknown
}): SymbolEngineError => new SymbolEngineError(params)

export const isSymbolEngineError = (cause: unknown): cause is SymbolEngineError => cause instanceof SymbolEngineError

export const messageOf = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message || cause.name
  if (typeof cause === 'string') return cause
  return String(cause)
}
