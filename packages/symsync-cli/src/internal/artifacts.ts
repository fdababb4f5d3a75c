import { Effect } from 'effect'

import type { CliError } from './errors.js'
import { writeJsonFile } from './output.js'
import { ARTIFACT_FILES, type ArtifactKey, type ArtifactOutput, type ArtifactValues, type OversizedInline } from './result.js'
import { toStableJson } from './stableJson.js'

const PREVIEW_CHARS = 256

const toBytes = (text: string): number => new TextEncoder().encode(text).length

const oversized = (json: string, bytes: number, budgetBytes: number): OversizedInline => ({
  _tag: 'oversized',
  bytes,
  preview: json.slice(0, Math.min(PREVIEW_CHARS, budgetBytes)),
})

/** Sorted, de-duplicated codes; `undefined` when there are none. */
export const reasonCodesOf = (codes: Iterable<string>): ReadonlyArray<string> | undefined => {
  const distinct = Array.from(new Set(codes)).sort()
  return distinct.length > 0 ? distinct : undefined
}

/**
 * Written to `<outDir>/<file>` when an output directory is set, inline otherwise.
 * Inline values over `budgetBytes` are replaced by a truncated preview.
 */
export const makeArtifactOutput = <K extends ArtifactKey>(args: {
  readonly outDir?: string
  readonly budgetBytes?: number
  readonly outputKey: K
  readonly value: ArtifactValues[K]
  readonly reasonCodes?: ReadonlyArray<string>
}): Effect.Effect<ArtifactOutput, CliError> =>
  Effect.gen(function* () {
    const head = {
      outputKey: args.outputKey,
      kind: args.value.kind,
      schemaVersion: 1,
      ok: true,
      ...(args.reasonCodes ? { reasonCodes: args.reasonCodes } : null),
    } as const

    if (args.outDir) {
      const file = yield* writeJsonFile(args.outDir, ARTIFACT_FILES[args.outputKey], args.value)
      return { ...head, file }
    }

    const inline = toStableJson(args.value) ?? null
    const json = JSON.stringify(inline)
    const bytes = toBytes(json)
    const budget = args.budgetBytes
    if (budget !== undefined && Number.isFinite(budget) && budget > 0 && bytes > budget) {
      return { ...head, inline: oversized(json, bytes, budget), truncated: true, budgetBytes: budget, actualBytes: bytes } as const
    }

    return { ...head, inline, ...(budget ? { budgetBytes: budget, actualBytes: bytes } : null) }
  })
