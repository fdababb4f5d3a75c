import type { Reconciler, Templates } from '@symsync/engine'

import type { CliCommand, CliMode } from './args.js'
import type { SerializableErrorSummary } from './errors.js'

export type JsonValue = null | boolean | number | string | { readonly [k: string]: JsonValue } | ReadonlyArray<JsonValue>

export type TemplateExtractV1 = {
  readonly schemaVersion: 1
  readonly kind: 'TemplateExtract'
  readonly templateName: string
  readonly symbolName: string
  readonly entry: Templates.TemplateEntry
  /** The entry as a one-template `templates:` document. */
  readonly yaml: string
}

/** Value written for each artifact, by output key. */
export type ArtifactValues = {
  readonly reconcileReport: Reconciler.ReconcileReportV1
  readonly writeBackResult: Reconciler.WriteBackResultV1
  readonly templateExtract: TemplateExtractV1
}

export type ArtifactKey = keyof ArtifactValues
export type ArtifactKind = ArtifactValues[ArtifactKey]['kind']

export const ARTIFACT_FILES: { readonly [K in ArtifactKey]: string } = {
  reconcileReport: 'reconcile.report.json',
  writeBackResult: 'writeback.result.json',
  templateExtract: 'template.extract.json',
}

/** Stands in for an inline value over the byte budget. */
export type OversizedInline = {
  readonly _tag: 'oversized'
  readonly bytes: number
  readonly preview: string
}

export type ArtifactOutput = {
  readonly outputKey: ArtifactKey
  readonly kind: ArtifactKind
  readonly schemaVersion: 1
  readonly ok: true
  readonly file?: string
  readonly inline?: JsonValue | OversizedInline
  readonly truncated?: true
  readonly budgetBytes?: number
  readonly actualBytes?: number
  /** Distinct diagnostic or omission codes carried by the value, sorted. */
  readonly reasonCodes?: ReadonlyArray<string>
}

type CommandResultBase = {
  readonly schemaVersion: 1
  readonly kind: 'CommandResult'
  readonly runId: string
  readonly command: CliCommand | 'unknown'
  readonly mode?: CliMode
}

export type CommandResult =
  | (CommandResultBase & {
      readonly ok: true
      readonly artifacts: ReadonlyArray<ArtifactOutput>
      readonly error?: undefined
    })
  | (CommandResultBase & {
      readonly ok: false
      readonly artifacts: readonly []
      readonly error: SerializableErrorSummary
    })

export const sortArtifactsByOutputKey = (artifacts: ReadonlyArray<ArtifactOutput>): ReadonlyArray<ArtifactOutput> =>
  Array.from(artifacts).sort((a, b) => (a.outputKey < b.outputKey ? -1 : a.outputKey > b.outputKey ? 1 : 0))

export const makeCommandResult = (args: {
  readonly runId: string
  readonly command: CliCommand
  readonly mode?: CliMode
  readonly artifacts: ReadonlyArray<ArtifactOutput>
}): CommandResult => ({
  schemaVersion: 1,
  kind: 'CommandResult',
  runId: args.runId,
  command: args.command,
  ...(args.mode ? { mode: args.mode } : null),
  ok: true,
  artifacts: args.artifacts,
})

export const makeErrorCommandResult = (args: {
  readonly runId: string
  readonly command: CliCommand | 'unknown'
  readonly mode?: CliMode
  readonly error: SerializableErrorSummary
}): CommandResult => ({
  schemaVersion: 1,
  kind: 'CommandResult',
  runId: args.runId,
  command: args.command,
  ...(args.mode ? { mode: args.mode } : null),
  ok: false,
  artifacts: [],
  error: args.error,
})
