import { Effect } from 'effect'

import { parseCliInvocation, type CliHelpResult, type CliInvocation } from './internal/args.js'
import { resolveCliConfigArgvPrefix } from './internal/cliConfig.js'
import { asSerializableErrorSummary, exitCodeFromErrorSummary, makeCliError, type CliExitCode } from './internal/errors.js'
import { cliLoggerLayer } from './internal/logger.js'
import type { FetchLike } from './internal/partDb.js'
import { makeErrorCommandResult, sortArtifactsByOutputKey, type CommandResult } from './internal/result.js'
import { stableStringifyJson } from './internal/stableJson.js'

export type RunOutcome =
  | { readonly kind: 'help'; readonly text: string; readonly exitCode: 0 }
  | { readonly kind: 'result'; readonly result: CommandResult; readonly exitCode: CliExitCode }

/** Seams for tests and embedders; the defaults are the process's own. */
export type CliServices = {
  readonly fetch?: FetchLike
  readonly env?: Readonly<Record<string, string | undefined>>
  readonly cwd?: string
}

export const formatCommandResult = (result: CommandResult): string => stableStringifyJson(result)

export const printHelp = (): string => `symsync

Usage:
  symsync library sync --runId <id> --apiUrl <url> --templates <file> --outputDir <dir> [--apiToken <token>] [--partsAfter YYYY-MM-DD] [--mode report|write] [--select <library>/<symbol> ...] [--selectAll] [--out <dir>]
  symsync template extract --runId <id> --library <file.kicad_sym> --symbol <name> [--template <name>] [--categories <a,b>] [--out <dir>]

Global options:
  --runId <string>     required; names the run in the result and artifact paths
  --out <dir>          write artifacts to this directory (stdout still carries CommandResult@v1)
  --outRoot <dir>      without --out, write artifacts to <outRoot>/<command>/<runId>
  --budgetBytes <n>    size limit for inline artifacts on stdout (larger ones are truncated)
  --mode report|write  library sync only; default report (nothing is written)
  --cliConfig <path>   use this symsync.cli.json (default: nearest one above the working directory)
  --profile <name>     apply a profile from the config file on top of its defaults
  --quiet              no logs on stderr
  -h, --help           show this help

Environment:
  SYMSYNC_API_TOKEN    bearer token used when --apiToken is not given
`

type LibrarySyncInvocation = Extract<CliInvocation, { readonly command: 'library.sync' }>
type TemplateExtractInvocation = Extract<CliInvocation, { readonly command: 'template.extract' }>

const runLibrarySync = (inv: LibrarySyncInvocation, services: CliServices): Effect.Effect<CommandResult, unknown> =>
  Effect.tryPromise({
    try: () => import('./internal/commands/librarySync.js'),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_COMMAND_IMPORT_FAILED',
        message: 'cannot load command: library.sync',
        cause,
      }),
  }).pipe(
    Effect.flatMap((mod) =>
      mod.runLibrarySync(inv, {
        ...(services.fetch ? { fetch: services.fetch } : null),
        ...(services.env ? { env: services.env } : null),
      }),
    ),
  )

const runTemplateExtract = (inv: TemplateExtractInvocation): Effect.Effect<CommandResult, unknown> =>
  Effect.tryPromise({
    try: () => import('./internal/commands/templateExtract.js'),
    catch: (cause) =>
      makeCliError({
        code: 'CLI_COMMAND_IMPORT_FAILED',
        message: 'cannot load command: template.extract',
        cause,
      }),
  }).pipe(Effect.flatMap((mod) => mod.runTemplateExtract(inv)))

const runCommand = (inv: CliInvocation, services: CliServices): Effect.Effect<CommandResult, unknown> => {
  switch (inv.command) {
    case 'library.sync':
      return runLibrarySync(inv, services)
    case 'template.extract':
      return runTemplateExtract(inv)
  }
}

const isHelp = (x: CliHelpResult | CliInvocation): x is CliHelpResult => x.kind === 'help'

const tryGetRunId = (argv: ReadonlyArray<string>): string | undefined => {
  const idx = argv.lastIndexOf('--runId')
  if (idx < 0) return undefined
  const next = argv[idx + 1]
  if (!next || next.startsWith('--')) return undefined
  return next
}

const failedOutcome = (argv: ReadonlyArray<string>, cause: unknown): RunOutcome => {
  const error = asSerializableErrorSummary(cause)
  return {
    kind: 'result',
    result: makeErrorCommandResult({ runId: tryGetRunId(argv) ?? 'missing-runId', command: 'unknown', error }),
    exitCode: exitCodeFromErrorSummary(error),
  }
}

export const runCli = (argv: ReadonlyArray<string>, services: CliServices = {}): Effect.Effect<RunOutcome, never> =>
  (argv.includes('-h') || argv.includes('--help') || argv.length === 0
    ? Effect.succeed(argv)
    : resolveCliConfigArgvPrefix(argv, services.cwd ? { cwd: services.cwd } : undefined).pipe(
        Effect.map((prefix) => (prefix.length > 0 ? [...prefix, ...argv] : argv)),
      )
  ).pipe(
    Effect.flatMap((argv2) => parseCliInvocation(argv2, { helpText: printHelp() })),
    Effect.matchEffect({
      onFailure: (cause) => Effect.succeed(failedOutcome(argv, cause)),
      onSuccess: (parsed): Effect.Effect<RunOutcome> => {
        if (isHelp(parsed)) {
          const help: RunOutcome = { kind: 'help', text: parsed.text, exitCode: 0 }
          return Effect.succeed(help)
        }

        return runCommand(parsed, services).pipe(
          Effect.provide(cliLoggerLayer({ quiet: parsed.global.quiet })),
          Effect.map((result): RunOutcome => ({
            kind: 'result',
            result: result.ok ? { ...result, artifacts: sortArtifactsByOutputKey(result.artifacts) } : result,
            exitCode: result.ok ? 0 : exitCodeFromErrorSummary(result.error),
          })),
          Effect.catchAllCause((cause) => {
            const error = asSerializableErrorSummary(
              makeCliError({
                code: 'CLI_COMMAND_FAILED',
                message: `command failed: ${parsed.command}`,
                cause,
              }),
            )
            const outcome: RunOutcome = {
              kind: 'result',
              result: makeErrorCommandResult({
                runId: parsed.global.runId,
                command: parsed.command,
                ...(parsed.global.mode ? { mode: parsed.global.mode } : null),
                error,
              }),
              exitCode: 1,
            }
            return Effect.succeed(outcome)
          }),
        )
      },
    }),
    Effect.catchAllCause((cause) =>
      Effect.succeed(
        failedOutcome(
          argv,
          makeCliError({
            code: 'CLI_INTERNAL',
            message: 'unexpected failure before the command ran',
            cause,
          }),
        ),
      ),
    ),
    // Until the invocation is parsed only the raw argv can ask for quiet.
    Effect.provide(cliLoggerLayer({ quiet: argv.includes('--quiet') })),
  )

export const main = runCli
