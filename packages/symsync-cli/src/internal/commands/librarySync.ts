import { Reconciler } from '@symsync/engine'
import { Effect } from 'effect'

import { makeArtifactOutput, reasonCodesOf } from '../artifacts.js'
import type { CliInvocation } from '../args.js'
import { asSerializableErrorSummary } from '../errors.js'
import { partDbLayer, type FetchLike } from '../partDb.js'
import { makeCommandResult, makeErrorCommandResult, type ArtifactOutput, type CommandResult } from '../result.js'
import { loadTemplatesFile } from '../templatesFile.js'

type LibrarySyncInvocation = Extract<CliInvocation, { readonly command: 'library.sync' }>

export type LibrarySyncServices = {
  readonly fetch?: FetchLike
  readonly env?: Readonly<Record<string, string | undefined>>
}

export const runLibrarySync = (
  inv: LibrarySyncInvocation,
  services: LibrarySyncServices = {},
): Effect.Effect<CommandResult, never> => {
  const runId = inv.global.runId
  const mode = inv.global.mode ?? 'report'
  const env = services.env ?? process.env

  return Effect.gen(function* () {
    const templates = yield* loadTemplatesFile(inv.templatesFile)
    const apiToken = inv.apiToken ?? env.SYMSYNC_API_TOKEN
    const reconciler = Reconciler.makeReconciler({ outputDir: inv.outputDir, templates })

    const plan = yield* reconciler.plan.pipe(
      Effect.provide(
        partDbLayer({
          apiUrl: inv.apiUrl,
          ...(apiToken ? { apiToken } : null),
          ...(inv.partsAfter ? { partsAfter: inv.partsAfter } : null),
          ...(services.fetch ? { fetch: services.fetch } : null),
        }),
      ),
    )

    const s = plan.summary
    yield* Effect.logInfo(
      `plan: ${s.newTotal} new, ${s.modifiedTotal} modified, ${s.unchangedTotal} unchanged, ${s.skippedTotal} skipped`,
    )

    const artifacts: ArtifactOutput[] = [
      yield* makeArtifactOutput({
        outDir: inv.global.outDir,
        budgetBytes: inv.global.budgetBytes,
        outputKey: 'reconcileReport',
        value: Reconciler.toReconcileReport(plan),
        reasonCodes: reasonCodesOf(plan.diagnostics.map((d) => d.code)),
      }),
    ]

    if (mode === 'write') {
      const selection = inv.selectAll ? Reconciler.allChangeKeys(plan) : inv.select
      const writeBack = yield* reconciler.commit(plan, selection)
      artifacts.push(
        yield* makeArtifactOutput({
          outDir: inv.global.outDir,
          budgetBytes: inv.global.budgetBytes,
          outputKey: 'writeBackResult',
          value: writeBack,
          reasonCodes: reasonCodesOf(writeBack.omitted.flatMap((o) => o.reasonCodes)),
        }),
      )
    }

    return makeCommandResult({ runId, command: 'library.sync', mode, artifacts })
  }).pipe(
    Effect.annotateLogs({ command: 'library.sync' }),
    Effect.catchAll((cause) =>
      Effect.succeed(makeErrorCommandResult({ runId, command: 'library.sync', mode, error: asSerializableErrorSummary(cause) })),
    ),
  )
}
