import { randomUUID } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'

import { Effect } from 'effect'

import { makeSymbolEngineError, type SymbolEngineError } from './errors.js'

export const ensureDir = (dir: string): Effect.Effect<void, SymbolEngineError> =>
  Effect.tryPromise({
    try: () => fs.mkdir(dir, { recursive: true }),
    catch: (cause) =>
      makeSymbolEngineError({
        code: 'IO_FAILURE',
        message: `failed to create directory: ${dir}`,
        cause,
      }),
  }).pipe(Effect.asVoid)

/**
 * Writes `text` beside the target and renames it into place, so readers see either the old
 * file or the complete new one.
 */
export const writeFileAtomic = (filePath: string, text: string): Effect.Effect<void, SymbolEngineError> => {
  const tmp = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`)
  return Effect.tryPromise({
    try: async () => {
      try {
        await fs.writeFile(tmp, text, 'utf8')
        await fs.rename(tmp, filePath)
      } catch (cause) {
        await fs.rm(tmp, { force: true })
        throw cause
      }
    },
    catch: (cause) =>
      makeSymbolEngineError({
        code: 'IO_FAILURE',
        message: `failed to write library: ${filePath}`,
        cause,
      }),
  })
}
