import fs from 'node:fs/promises'

import { Effect } from 'effect'

import { logDiagnostics } from './internal/diagnostics.js'
import { makeSymbolEngineError, type SymbolEngineError } from './internal/errors.js'
import type { Diagnostic } from './internal/model.js'
import { ReasonCodes } from './internal/reasonCodes.js'
import { scanSymbolBlocks } from './internal/scanner.js'

export type ParsedLibrary = {
  readonly symbols: ReadonlyMap<string, string>
  readonly warnings: ReadonlyArray<Diagnostic>
}

export type LibrarySnapshot = ParsedLibrary & {
  readonly file: string
  readonly exists: boolean
}

/**
 * Top-level symbol blocks by name, text preserved byte for byte.
 * Unclosed blocks are omitted with a warning; a repeated name keeps its first block.
 */
export const parseLibrary = (text: string, options?: { readonly library?: string }): ParsedLibrary => {
  const library = options?.library
  const scan = scanSymbolBlocks(text)
  const symbols = new Map<string, string>()
  const warnings: Diagnostic[] = []

  for (const block of scan.blocks) {
    if (symbols.has(block.name)) {
      warnings.push({
        code: ReasonCodes.parseDuplicate,
        severity: 'warning',
        message: `duplicate symbol "${block.name}" in existing library; keeping the first block`,
        ...(library ? { library } : null),
        symbol: block.name,
      })
      continue
    }
    symbols.set(block.name, block.text)
  }

  for (const miss of scan.unclosed) {
    warnings.push({
      code: ReasonCodes.parseUnclosed,
      severity: 'warning',
      message: `symbol "${miss.name}" has no closing parenthesis (offset ${miss.start}); treated as absent`,
      ...(library ? { library } : null),
      symbol: miss.name,
    })
  }

  return { symbols, warnings }
}

const isNotFound = (cause: unknown): boolean =>
  typeof cause === 'object' && cause !== null && 'code' in cause && cause.code === 'ENOENT'

/** Reads and parses a library file; a missing file is an empty library. */
export const readLibrary = (
  filePath: string,
  options?: { readonly library?: string },
): Effect.Effect<LibrarySnapshot, SymbolEngineError> =>
  Effect.gen(function* () {
    const text = yield* Effect.tryPromise({
      try: async () => {
        try {
          return await fs.readFile(filePath, 'utf8')
        } catch (cause) {
          if (isNotFound(cause)) return undefined
          throw cause
        }
      },
      catch: (cause) =>
        makeSymbolEngineError({
          code: 'IO_FAILURE',
          message: `failed to read library: ${filePath}`,
          cause,
        }),
    })

    if (text === undefined) {
      return { file: filePath, exists: false, symbols: new Map<string, string>(), warnings: [] }
    }

    const parsed = parseLibrary(text, options)
    yield* logDiagnostics(parsed.warnings)
    return { file: filePath, exists: true, ...parsed }
  })
