import fs from 'node:fs/promises'
import path from 'node:path'

import { Effect } from 'effect'

import { makeCliError, type CliError } from './errors.js'
import { stableStringifyJson } from './stableJson.js'

const ensureDir = (dir: string): Effect.Effect<void, CliError> =>
  Effect.tryPromise({
    try: () => fs.mkdir(dir, { recursive: true }),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_IO_ERROR',
        message: `cannot create directory: ${dir}`,
        cause,
      }),
  })

export const writeJsonFile = (outDir: string, fileName: string, value: unknown): Effect.Effect<string, CliError> =>
  Effect.gen(function* () {
    const dir = path.resolve(process.cwd(), outDir)
    yield* ensureDir(dir)
    const filePath = path.join(dir, fileName)
    yield* Effect.tryPromise({
      try: () => fs.writeFile(filePath, `${stableStringifyJson(value, 2)}\n`, 'utf8'),
      catch: (cause) =>
        makeCliError({
          code: 'CLI_IO_ERROR',
          message: `write failed: ${filePath}`,
          cause,
        }),
    })
    return fileName
  })

export const readTextFile = (filePath: string, label: string): Effect.Effect<string, CliError> =>
  Effect.tryPromise({
    try: () => fs.readFile(filePath, 'utf8'),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_INVALID_INPUT',
        message: `cannot read ${label}: ${filePath}`,
        cause,
      }),
  })
