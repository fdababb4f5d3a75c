import fs from 'node:fs/promises'
import path from 'node:path'

import { Effect, ParseResult, Schema } from 'effect'

import { makeCliError, type CliError } from './errors.js'

export const CLI_CONFIG_FILE_NAME = 'symsync.cli.json'

const NonEmptyText = Schema.Trim.pipe(Schema.nonEmptyString())

const CliProfileDefaultsSchema = Schema.Struct({
  apiUrl: Schema.optional(NonEmptyText),
  partsAfter: Schema.optional(NonEmptyText),
  templates: Schema.optional(NonEmptyText),
  outputDir: Schema.optional(NonEmptyText),
  outRoot: Schema.optional(NonEmptyText),
  mode: Schema.optional(Schema.Literal('report', 'write')),
  budgetBytes: Schema.optional(Schema.Int.pipe(Schema.positive())),
  quiet: Schema.optional(Schema.Boolean),
})

const SymsyncCliConfigFileSchema = Schema.Struct({
  schemaVersion: Schema.Literal(1),
  defaults: Schema.optional(CliProfileDefaultsSchema),
  profiles: Schema.optional(Schema.Record({ key: Schema.String, value: CliProfileDefaultsSchema })),
})

export type CliProfileDefaults = Schema.Schema.Type<typeof CliProfileDefaultsSchema>
export type SymsyncCliConfigFile = Schema.Schema.Type<typeof SymsyncCliConfigFileSchema>

const readJsonFile = (filePath: string): Effect.Effect<unknown, CliError> =>
  Effect.tryPromise({
    try: async (): Promise<unknown> => JSON.parse(await fs.readFile(filePath, 'utf8')),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_INVALID_INPUT',
        message: `cannot read or parse config file: ${filePath}`,
        cause,
      }),
  })

const statExists = (filePath: string): Effect.Effect<boolean> =>
  Effect.tryPromise(() => fs.stat(filePath)).pipe(
    Effect.as(true),
    Effect.orElseSucceed(() => false),
  )

const findUp = (startDir: string, fileName: string): Effect.Effect<string | undefined> =>
  Effect.gen(function* () {
    let dir = path.resolve(startDir)
    while (true) {
      const candidate = path.join(dir, fileName)
      if (yield* statExists(candidate)) return candidate
      const parent = path.dirname(dir)
      if (parent === dir) return undefined
      dir = parent
    }
  })

const getFlag = (argv: ReadonlyArray<string>, name: string): Effect.Effect<string | undefined, CliError> => {
  const idx = argv.lastIndexOf(`--${name}`)
  if (idx < 0) return Effect.succeed(undefined)
  const next = argv[idx + 1]
  if (!next || next.startsWith('--')) {
    return Effect.fail(makeCliError({ code: 'CLI_INVALID_ARGUMENT', message: `--${name} requires a value` }))
  }
  return Effect.succeed(next.trim().length > 0 ? next.trim() : undefined)
}

export const decodeCliConfigFile = (input: unknown, filePath: string): Effect.Effect<SymsyncCliConfigFile, CliError> =>
  Schema.decodeUnknown(SymsyncCliConfigFileSchema, { onExcessProperty: 'error' })(input).pipe(
    Effect.mapError((error) =>
      makeCliError({
        code: 'CLI_INVALID_INPUT',
        message: `invalid config file ${filePath}: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
        hint: 'schemaVersion 1 allows only the keys apiUrl, partsAfter, templates, outputDir, outRoot, mode, budgetBytes, quiet.',
      }),
    ),
  )

// Paths in the config file are relative to the file itself.
const toArgvPrefix = (defaults: CliProfileDefaults, baseDir: string): ReadonlyArray<string> => {
  const tokens: string[] = []
  const resolve = (p: string): string => path.resolve(baseDir, p)

  if (defaults.apiUrl) tokens.push('--apiUrl', defaults.apiUrl)
  if (defaults.partsAfter) tokens.push('--partsAfter', defaults.partsAfter)
  if (defaults.templates) tokens.push('--templates', resolve(defaults.templates))
  if (defaults.outputDir) tokens.push('--outputDir', resolve(defaults.outputDir))
  if (defaults.outRoot) tokens.push('--outRoot', resolve(defaults.outRoot))
  if (defaults.mode) tokens.push('--mode', defaults.mode)
  if (defaults.budgetBytes) tokens.push('--budgetBytes', String(defaults.budgetBytes))
  if (defaults.quiet === true) tokens.push('--quiet')

  return tokens
}

/**
 * Flags contributed by `symsync.cli.json` (explicit `--cliConfig`, else the nearest one above
 * `cwd`): `defaults` first, then the selected `--profile`. They are placed before the user's
 * argv, so an explicit flag wins.
 */
export const resolveCliConfigArgvPrefix = (
  argv: ReadonlyArray<string>,
  options?: { readonly cwd?: string },
): Effect.Effect<ReadonlyArray<string>, CliError> =>
  Effect.gen(function* () {
    const cwd = options?.cwd ?? process.cwd()
    const explicitPath = yield* getFlag(argv, 'cliConfig')
    const profile = yield* getFlag(argv, 'profile')

    const configPath = explicitPath ? path.resolve(cwd, explicitPath) : yield* findUp(cwd, CLI_CONFIG_FILE_NAME)

    if (!configPath) {
      if (profile) {
        return yield* Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_INPUT',
            message: `--profile ${profile} given but no ${CLI_CONFIG_FILE_NAME} was found`,
            hint: `Place ${CLI_CONFIG_FILE_NAME} in this or a parent directory, or pass --cliConfig <path>.`,
          }),
        )
      }
      return []
    }

    if (explicitPath && !(yield* statExists(configPath))) {
      return yield* Effect.fail(
        makeCliError({ code: 'CLI_INVALID_INPUT', message: `config file not found: ${explicitPath}` }),
      )
    }

    const config = yield* readJsonFile(configPath).pipe(Effect.flatMap((raw) => decodeCliConfigFile(raw, configPath)))
    const baseDir = path.dirname(configPath)

    const tokens: string[] = []
    if (config.defaults) tokens.push(...toArgvPrefix(config.defaults, baseDir))

    if (profile) {
      const profileDefaults = config.profiles?.[profile]
      if (!profileDefaults) {
        return yield* Effect.fail(makeCliError({ code: 'CLI_INVALID_INPUT', message: `profile not found: ${profile}` }))
      }
      tokens.push(...toArgvPrefix(profileDefaults, baseDir))
    }

    yield* Effect.logDebug(`using ${configPath}`)
    return tokens
  })
