import path from 'node:path'

import { CliConfig, CommandDescriptor, CommandDirective, HelpDoc, Options, ValidationError } from '@effect/cli'
import { NodeContext } from '@effect/platform-node'
import { Effect, Option as FxOption, Predicate } from 'effect'

import { makeCliError } from './errors.js'

export type CliMode = 'report' | 'write'

export type CliCommand = 'library.sync' | 'template.extract'

export type CliInvocation =
  | {
      readonly kind: 'command'
      readonly command: 'library.sync'
      readonly global: CliInvocation.Global
      readonly apiUrl: string
      readonly apiToken?: string
      readonly partsAfter?: string
      readonly templatesFile: string
      readonly outputDir: string
      readonly select: ReadonlyArray<string>
      readonly selectAll: boolean
    }
  | {
      readonly kind: 'command'
      readonly command: 'template.extract'
      readonly global: CliInvocation.Global
      readonly libraryFile: string
      readonly symbol: string
      readonly templateName?: string
      readonly categories: ReadonlyArray<string>
    }

export declare namespace CliInvocation {
  export type Global = {
    readonly runId: string
    readonly outDir?: string
    readonly budgetBytes?: number
    readonly mode?: CliMode
    readonly quiet: boolean
  }
}

export type CliHelpResult = { readonly kind: 'help'; readonly text: string }

const optionalText = (name: string): Options.Options<string | undefined> =>
  Options.text(name).pipe(
    Options.optional,
    Options.map((opt) => {
      const value = FxOption.getOrUndefined(opt)?.trim()
      return value && value.length > 0 ? value : undefined
    }),
  )

const positiveIntOptional = (name: string): Options.Options<number | undefined> =>
  Options.integer(name).pipe(
    Options.optional,
    Options.mapEffect((opt) =>
      FxOption.match(opt, {
        onNone: () => Effect.succeed(undefined),
        onSome: (n) =>
          n > 0 ? Effect.succeed(n) : Effect.fail(ValidationError.invalidValue(HelpDoc.p(`--${name} must be a positive integer`))),
      }),
    ),
  )

export type ParsedOptions = {
  readonly runId?: string
  readonly out?: string
  readonly outRoot?: string
  readonly budgetBytes?: number
  readonly mode?: CliMode
  readonly cliConfig?: string
  readonly profile?: string
  readonly quiet: boolean
  readonly apiUrl?: string
  readonly apiToken?: string
  readonly partsAfter?: string
  readonly templates?: string
  readonly outputDir?: string
  readonly select: ReadonlyArray<string>
  readonly selectAll: boolean
  readonly library?: string
  readonly symbol?: string
  readonly template?: string
  readonly categories?: string
}

type LeafParsed =
  | {
      readonly command: 'library.sync'
      readonly options: ParsedOptions
      readonly apiUrl: string
      readonly templatesFile: string
      readonly outputDir: string
    }
  | {
      readonly command: 'template.extract'
      readonly options: ParsedOptions
      readonly libraryFile: string
      readonly symbol: string
    }

const baseOptions: Options.Options<ParsedOptions> = Options.all({
  runId: optionalText('runId'),
  out: optionalText('out'),
  outRoot: optionalText('outRoot'),
  budgetBytes: positiveIntOptional('budgetBytes'),
  mode: Options.choice('mode', ['report', 'write'] as const).pipe(Options.optional, Options.map(FxOption.getOrUndefined)),
  cliConfig: optionalText('cliConfig'),
  profile: optionalText('profile'),
  quiet: Options.boolean('quiet'),
  apiUrl: optionalText('apiUrl'),
  apiToken: optionalText('apiToken'),
  partsAfter: optionalText('partsAfter'),
  templates: optionalText('templates'),
  outputDir: optionalText('outputDir'),
  select: Options.text('select').pipe(Options.repeated),
  selectAll: Options.boolean('selectAll'),
  library: optionalText('library'),
  symbol: optionalText('symbol'),
  template: optionalText('template'),
  categories: optionalText('categories'),
})

const isoDateRe = /^\d{4}-\d{2}-\d{2}$/

export const isValidIsoDate = (value: string): boolean => {
  if (!isoDateRe.test(value)) return false
  const date = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(date.getTime()) && date.toISOString().startsWith(value)
}

const parseLibrarySyncFromOptions = (
  opts: ParsedOptions,
): Effect.Effect<{ readonly apiUrl: string; readonly templatesFile: string; readonly outputDir: string }, ValidationError.ValidationError> => {
  if (!opts.apiUrl) {
    return Effect.fail(ValidationError.missingFlag(HelpDoc.p('missing --apiUrl <url> (or apiUrl in symsync.cli.json)')))
  }
  if (!opts.templates) {
    return Effect.fail(ValidationError.missingFlag(HelpDoc.p('missing --templates <file> (or templates in symsync.cli.json)')))
  }
  if (!opts.outputDir) {
    return Effect.fail(ValidationError.missingFlag(HelpDoc.p('missing --outputDir <dir> (or outputDir in symsync.cli.json)')))
  }
  if (opts.partsAfter && !isValidIsoDate(opts.partsAfter)) {
    return Effect.fail(ValidationError.invalidValue(HelpDoc.p(`invalid --partsAfter: ${opts.partsAfter} (expected YYYY-MM-DD)`)))
  }
  const badSelect = opts.select.find((key) => key.indexOf('/') <= 0)
  if (badSelect !== undefined) {
    return Effect.fail(ValidationError.invalidValue(HelpDoc.p(`invalid --select: ${badSelect} (expected <library>/<symbol>)`)))
  }
  return Effect.succeed({ apiUrl: opts.apiUrl, templatesFile: opts.templates, outputDir: opts.outputDir })
}

const parseTemplateExtractFromOptions = (
  opts: ParsedOptions,
): Effect.Effect<{ readonly libraryFile: string; readonly symbol: string }, ValidationError.ValidationError> => {
  if (!opts.library || !opts.symbol) {
    return Effect.fail(ValidationError.missingFlag(HelpDoc.p('missing input: provide --library <file> and --symbol <name>')))
  }
  return Effect.succeed({ libraryFile: opts.library, symbol: opts.symbol })
}

const librarySyncCommand = CommandDescriptor.make('sync', baseOptions).pipe(
  CommandDescriptor.mapEffect(({ options }) =>
    parseLibrarySyncFromOptions(options).pipe(Effect.map((sync) => ({ command: 'library.sync' as const, options, ...sync }))),
  ),
)

const libraryCommand = CommandDescriptor.make('library').pipe(
  CommandDescriptor.withSubcommands([['sync', librarySyncCommand]] as const),
)

const templateExtractCommand = CommandDescriptor.make('extract', baseOptions).pipe(
  CommandDescriptor.mapEffect(({ options }) =>
    parseTemplateExtractFromOptions(options).pipe(
      Effect.map((input) => ({ command: 'template.extract' as const, options, ...input })),
    ),
  ),
)

const templateCommand = CommandDescriptor.make('template').pipe(
  CommandDescriptor.withSubcommands([['extract', templateExtractCommand]] as const),
)

const rootCommand = CommandDescriptor.make('symsync').pipe(
  CommandDescriptor.withSubcommands([
    ['library', libraryCommand],
    ['template', templateCommand],
  ] as const),
)

const isLeafParsed = (value: unknown): value is LeafParsed =>
  Predicate.hasProperty(value, 'command') &&
  (value.command === 'library.sync' || value.command === 'template.extract') &&
  Predicate.hasProperty(value, 'options')

const unwrapToLeaf = (value: unknown): LeafParsed | undefined => {
  if (isLeafParsed(value)) return value
  if (!Predicate.hasProperty(value, 'subcommand')) return undefined
  const sub = value.subcommand
  if (!FxOption.isOption(sub) || FxOption.isNone(sub)) return undefined
  const inner: unknown = sub.value
  if (Array.isArray(inner) && inner.length >= 2) return unwrapToLeaf(inner[1])
  return unwrapToLeaf(inner)
}

const flagsWithValue: ReadonlySet<string> = new Set([
  '--apiToken',
  '--apiUrl',
  '--budgetBytes',
  '--categories',
  '--cliConfig',
  '--library',
  '--mode',
  '--out',
  '--outRoot',
  '--outputDir',
  '--partsAfter',
  '--profile',
  '--runId',
  '--select',
  '--symbol',
  '--template',
  '--templates',
])

const repeatableOptionNames: ReadonlySet<string> = new Set(['select'])

type ParsedOptionOccurrence = {
  readonly key?: string
  readonly tokens: ReadonlyArray<string>
  readonly allowMultiple: boolean
}

const parseOptionOccurrences = (tokens: ReadonlyArray<string>): ReadonlyArray<ParsedOptionOccurrence> => {
  const out: Array<ParsedOptionOccurrence> = []
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i] ?? ''
    if (!token.startsWith('-')) {
      out.push({ tokens: [token], allowMultiple: true })
      continue
    }
    const key = token.startsWith('--') ? token.slice(2) : undefined
    const allowMultiple = key !== undefined && repeatableOptionNames.has(key)
    const value = tokens[i + 1]
    if (flagsWithValue.has(token) && value !== undefined) {
      out.push({ key, tokens: [token, value], allowMultiple })
      i += 1
      continue
    }
    out.push({ key, tokens: [token], allowMultiple })
  }
  return out
}

/** Keeps the last occurrence of every single-valued flag so config-file defaults can be overridden. */
export const dedupeOptionTokensLastWins = (tokens: ReadonlyArray<string>): ReadonlyArray<string> => {
  const occurrences = parseOptionOccurrences(tokens)
  const seen = new Set<string>()
  const kept: Array<ParsedOptionOccurrence> = []
  for (let i = occurrences.length - 1; i >= 0; i--) {
    const occ = occurrences[i]
    if (!occ) continue
    if (!occ.key || occ.allowMultiple) {
      kept.push(occ)
      continue
    }
    if (seen.has(occ.key)) continue
    seen.add(occ.key)
    kept.push(occ)
  }
  kept.reverse()
  return kept.flatMap((o) => o.tokens)
}

const commandTokenShapes: ReadonlyArray<ReadonlyArray<string>> = [
  ['library', 'sync'],
  ['template', 'extract'],
]

const findCommandTokens = (
  argv: ReadonlyArray<string>,
): { readonly tokens: ReadonlyArray<string>; readonly indices: ReadonlyArray<number> } | undefined => {
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? ''
    if (token.startsWith('-')) {
      if (flagsWithValue.has(token)) i += 1
      continue
    }
    const shape = commandTokenShapes.find((s) => s.every((part, j) => argv[i + j] === part))
    if (shape) return { tokens: shape, indices: shape.map((_, j) => i + j) }
  }
  return undefined
}

// Command words first, then the flags, whatever order they were typed in.
const normalizeArgvForEffectCli = (argv: ReadonlyArray<string>): ReadonlyArray<string> => {
  const extracted = findCommandTokens(argv)
  if (!extracted) return dedupeOptionTokensLastWins(argv)

  const drop = new Set(extracted.indices)
  const rest = argv.filter((_, idx) => !drop.has(idx))
  return [...extracted.tokens, ...dedupeOptionTokensLastWins(rest)]
}

const renderValidationError = (err: ValidationError.ValidationError): string => {
  try {
    return HelpDoc.toAnsiText(err.error).replace(/\u001b\[[0-9;]*m/g, '').trim()
  } catch {
    return err._tag
  }
}

const splitList = (value: string | undefined): ReadonlyArray<string> =>
  (value ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)

export const parseCliInvocation = (
  argv: ReadonlyArray<string>,
  options: { readonly helpText: string },
): Effect.Effect<CliHelpResult | CliInvocation, unknown> => {
  if (argv.includes('-h') || argv.includes('--help') || argv.length === 0) {
    return Effect.succeed({ kind: 'help', text: options.helpText } as const satisfies CliHelpResult)
  }

  const normalized = normalizeArgvForEffectCli(argv)

  return CommandDescriptor.parse(rootCommand, ['symsync', ...normalized], CliConfig.defaultConfig).pipe(
    Effect.provide(NodeContext.layer),
    Effect.flatMap((directive): Effect.Effect<CliHelpResult | CliInvocation, unknown> => {
      if (CommandDirective.isBuiltIn(directive)) {
        return Effect.succeed({ kind: 'help', text: options.helpText } as const satisfies CliHelpResult)
      }

      if (directive.leftover.length > 0) {
        return Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_ARGUMENT',
            message: `unknown argument: ${directive.leftover[0] ?? ''}`,
            hint: options.helpText,
          }),
        )
      }

      const leaf = unwrapToLeaf(directive.value)
      if (!leaf) {
        return Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_COMMAND',
            message: 'missing command: expected "library sync" or "template extract"',
            hint: options.helpText,
          }),
        )
      }

      const runId = leaf.options.runId
      if (!runId) {
        return Effect.fail(makeCliError({ code: 'CLI_MISSING_RUNID', message: 'missing --runId (required)' }))
      }

      const outRoot = leaf.options.outRoot
      const outDir = leaf.options.out ?? (outRoot ? path.join(outRoot, leaf.command, runId) : undefined)
      const { budgetBytes, mode } = leaf.options

      const global: CliInvocation.Global = {
        runId,
        ...(outDir ? { outDir } : null),
        ...(budgetBytes ? { budgetBytes } : null),
        ...(mode ? { mode } : null),
        quiet: leaf.options.quiet,
      }

      switch (leaf.command) {
        case 'library.sync':
          return Effect.succeed({
            kind: 'command',
            command: 'library.sync',
            global,
            apiUrl: leaf.apiUrl,
            ...(leaf.options.apiToken ? { apiToken: leaf.options.apiToken } : null),
            ...(leaf.options.partsAfter ? { partsAfter: leaf.options.partsAfter } : null),
            templatesFile: leaf.templatesFile,
            outputDir: leaf.outputDir,
            select: leaf.options.select,
            selectAll: leaf.options.selectAll,
          } as const)
        case 'template.extract':
          return Effect.succeed({
            kind: 'command',
            command: 'template.extract',
            global,
            libraryFile: leaf.libraryFile,
            symbol: leaf.symbol,
            ...(leaf.options.template ? { templateName: leaf.options.template } : null),
            categories: splitList(leaf.options.categories),
          } as const)
      }
    }),
    Effect.catchAll((cause) => {
      if (ValidationError.isValidationError(cause)) {
        return Effect.fail(
          makeCliError({
            code: 'CLI_INVALID_ARGUMENT',
            message: renderValidationError(cause),
            hint: options.helpText,
            cause,
          }),
        )
      }
      return Effect.fail(cause)
    }),
  )
}
