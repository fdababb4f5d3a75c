import path from 'node:path'

import { Effect, Either } from 'effect'

import { equal } from './Differ.js'
import { ensureDir, writeFileAtomic } from './internal/atomicWrite.js'
import { logDiagnostics } from './internal/diagnostics.js'
import { makeSymbolEngineError, messageOf, type SymbolEngineError } from './internal/errors.js'
import type { Diagnostic, PartRecord, SymbolBlock, Template, TemplateSet } from './internal/model.js'
import { ReasonCodes } from './internal/reasonCodes.js'
import { readLibrary, type LibrarySnapshot } from './LibraryParser.js'
import { PartSource } from './PartSource.js'
import { renderSymbol, symbolNameOf } from './Renderer.js'
import { libraryFileNameOf, libraryNameOf, matchTemplate } from './Templates.js'

export const DEFAULT_LIBRARY_VERSION = '20211014'
export const DEFAULT_GENERATOR = 'symsync'

export type ReconcilerConfig = {
  readonly outputDir: string
  readonly templates: TemplateSet
  readonly libraryVersion?: string
  readonly generator?: string
}

export type ChangeKind = 'new' | 'modified'

export type ChangeEntry = {
  readonly key: string
  readonly kind: ChangeKind
  readonly library: string
  readonly file: string
  readonly symbolName: string
  readonly recordId: string
  readonly partName: string
  readonly template: string
}

export type ChangeSet = {
  readonly new: ReadonlyArray<ChangeEntry>
  readonly modified: ReadonlyArray<ChangeEntry>
}

export type LibraryMember = {
  readonly record: PartRecord
  readonly symbolName: string
  readonly template?: Template
  readonly desired?: SymbolBlock
}

export type LibraryPlan = {
  readonly library: string
  readonly fileName: string
  readonly existing: LibrarySnapshot
  readonly members: ReadonlyArray<LibraryMember>
}

export type ReconcileSummary = {
  readonly recordsTotal: number
  readonly librariesTotal: number
  readonly newTotal: number
  readonly modifiedTotal: number
  readonly unchangedTotal: number
  readonly skippedTotal: number
}

export type ReconcilePlan = {
  readonly schemaVersion: 1
  readonly kind: 'ReconcilePlan'
  readonly outputDir: string
  readonly header: string
  readonly libraries: ReadonlyArray<LibraryPlan>
  readonly changes: ChangeSet
  readonly diagnostics: ReadonlyArray<Diagnostic>
  readonly summary: ReconcileSummary
}

export type ReconcileReportV1 = {
  readonly schemaVersion: 1
  readonly kind: 'ReconcileReport'
  readonly libraries: ReadonlyArray<{
    readonly library: string
    readonly file: string
    readonly exists: boolean
    readonly existingSymbols: number
    readonly records: number
  }>
  readonly changes: ChangeSet
  readonly diagnostics: ReadonlyArray<Diagnostic>
  readonly summary: ReconcileSummary
}

export type WriteBackResultV1 = {
  readonly schemaVersion: 1
  readonly kind: 'WriteBackResult'
  readonly mode: 'write'
  readonly modifiedFiles: ReadonlyArray<{
    readonly file: string
    readonly library: string
    readonly changeKind: 'updated' | 'created'
    readonly symbols: number
  }>
  readonly committed: ReadonlyArray<string>
  readonly omitted: ReadonlyArray<{
    readonly key: string
    readonly reasonCodes: ReadonlyArray<string>
  }>
}

export const changeKeyOf = (library: string, symbolName: string): string => `${library}/${symbolName}`

export const libraryHeaderOf = (config: Pick<ReconcilerConfig, 'libraryVersion' | 'generator'>): string =>
  `(kicad_symbol_lib (version ${config.libraryVersion ?? DEFAULT_LIBRARY_VERSION}) (generator ${config.generator ?? DEFAULT_GENERATOR})`

/** Library file text: header, each block indented by two spaces, closing paren. */
export const renderLibrary = (header: string, blocks: ReadonlyArray<string>): string =>
  `${header}\n${blocks.map((b) => `  ${b}\n`).join('')})\n`

/** Records grouped by destination library, both in first-appearance order. */
export const groupByLibrary = (records: ReadonlyArray<PartRecord>): ReadonlyMap<string, ReadonlyArray<PartRecord>> => {
  const groups = new Map<string, PartRecord[]>()
  for (const record of records) {
    const library = libraryNameOf(record.categoryPath)
    const group = groups.get(library)
    if (group) group.push(record)
    else groups.set(library, [record])
  }
  return groups
}

type GeneratedMember = {
  readonly member: LibraryMember
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

const generateMember = (library: string, record: PartRecord, templates: TemplateSet): Effect.Effect<GeneratedMember> =>
  Effect.gen(function* () {
    const symbolName = symbolNameOf(record)
    const at = { library, symbol: symbolName, recordId: record.id }
    const template = matchTemplate(record.categoryPath, templates)
    if (!template) {
      const skipped: GeneratedMember = {
        member: { record, symbolName },
        diagnostics: [
          {
            code: ReasonCodes.templateMismatch,
            severity: 'warning',
            message: `no template matches category "${record.categoryPath}"; skipping "${record.name}"`,
            ...at,
          },
        ],
      }
      return skipped
    }

    const rendered = yield* Effect.either(
      Effect.try({
        try: () => renderSymbol(record, template),
        catch: (cause) => cause,
      }),
    )

    if (Either.isLeft(rendered)) {
      const failed: GeneratedMember = {
        member: { record, symbolName, template },
        diagnostics: [
          {
            code: ReasonCodes.renderFailed,
            severity: 'error',
            message: `failed to render "${record.name}": ${messageOf(rendered.left)}`,
            ...at,
          },
        ],
      }
      return failed
    }

    const generated: GeneratedMember = {
      member: { record, symbolName, template, desired: rendered.right },
      diagnostics:
        template.generator === 'NONE'
          ? [
              {
                code: ReasonCodes.renderPlaceholder,
                severity: 'warning',
                message: `template "${template.name}" has neither symbol_generator nor symbol_template; "${record.name}" gets a placeholder`,
                ...at,
              },
            ]
          : [],
    }
    return generated
  })

const assertUniqueSymbols = (plan: Pick<LibraryPlan, 'library' | 'members'>): Effect.Effect<void, SymbolEngineError> => {
  const seen = new Map<string, PartRecord>()
  for (const member of plan.members) {
    if (!member.desired) continue
    const prior = seen.get(member.desired.symbolName)
    if (prior) {
      return Effect.fail(
        makeSymbolEngineError({
          code: 'DUPLICATE_SYMBOL_NAME',
          message: `library "${plan.library}": parts ${prior.id} ("${prior.name}") and ${member.record.id} ("${member.record.name}") both render symbol "${member.desired.symbolName}"`,
          hint: 'Rename one of the parts; symbol names must be unique within a library.',
        }),
      )
    }
    seen.set(member.desired.symbolName, member.record)
  }
  return Effect.void
}

const classify = (plans: ReadonlyArray<LibraryPlan>): { readonly changes: ChangeSet; readonly unchanged: number } => {
  const added: ChangeEntry[] = []
  const modified: ChangeEntry[] = []
  let unchanged = 0

  for (const plan of plans) {
    for (const member of plan.members) {
      if (!member.desired || !member.template) continue
      const prior = plan.existing.symbols.get(member.desired.symbolName)
      if (prior !== undefined && equal(prior, member.desired.text)) {
        unchanged += 1
        continue
      }
      const entry: ChangeEntry = {
        key: changeKeyOf(plan.library, member.desired.symbolName),
        kind: prior === undefined ? 'new' : 'modified',
        library: plan.library,
        file: plan.fileName,
        symbolName: member.desired.symbolName,
        recordId: member.record.id,
        partName: member.record.name,
        template: member.template.name,
      }
      if (entry.kind === 'new') added.push(entry)
      else modified.push(entry)
    }
  }

  return { changes: { new: added, modified }, unchanged }
}

/**
 * Group, parse the existing libraries, render and classify. Nothing is written.
 *
 * A duplicate symbol name inside one library fails the whole plan.
 */
export const planFromRecords = (
  config: ReconcilerConfig,
  records: ReadonlyArray<PartRecord>,
): Effect.Effect<ReconcilePlan, SymbolEngineError> =>
  Effect.gen(function* () {
    if (config.templates.length === 0) {
      return yield* Effect.fail(
        makeSymbolEngineError({
          code: 'TEMPLATE_CONFIG_MISSING',
          message: 'no templates configured',
          hint: 'Provide a template document with at least one entry under "templates".',
        }),
      )
    }

    const outputDir = path.resolve(config.outputDir)
    const groups = groupByLibrary(records)
    const diagnostics: Diagnostic[] = []
    const libraries: LibraryPlan[] = []

    for (const [library, group] of groups) {
      const fileName = libraryFileNameOf(library)
      const existing = yield* readLibrary(path.join(outputDir, fileName), { library })
      diagnostics.push(...existing.warnings)

      const members: LibraryMember[] = []
      for (const record of group) {
        const out = yield* generateMember(library, record, config.templates)
        members.push(out.member)
        diagnostics.push(...out.diagnostics)
        yield* logDiagnostics(out.diagnostics)
      }

      const plan: LibraryPlan = { library, fileName, existing, members }
      yield* assertUniqueSymbols(plan)
      libraries.push(plan)
    }

    const { changes, unchanged } = classify(libraries)
    const skippedTotal = libraries.reduce((n, l) => n + l.members.filter((m) => !m.desired).length, 0)

    yield* Effect.logInfo(
      `reconcile plan: ${records.length} parts, ${libraries.length} libraries, ${changes.new.length} new, ${changes.modified.length} modified`,
    )

    return {
      schemaVersion: 1,
      kind: 'ReconcilePlan',
      outputDir,
      header: libraryHeaderOf(config),
      libraries,
      changes,
      diagnostics,
      summary: {
        recordsTotal: records.length,
        librariesTotal: libraries.length,
        newTotal: changes.new.length,
        modifiedTotal: changes.modified.length,
        unchangedTotal: unchanged,
        skippedTotal,
      },
    } satisfies ReconcilePlan
  })

/** Fetches from the `PartSource` service, then plans. */
export const planReconcile = (config: ReconcilerConfig): Effect.Effect<ReconcilePlan, Error, PartSource> =>
  Effect.gen(function* () {
    const source = yield* PartSource
    const records = yield* source.fetchParts
    return yield* planFromRecords(config, records)
  })

export const allChangeKeys = (plan: ReconcilePlan): ReadonlyArray<string> => [
  ...plan.changes.new.map((c) => c.key),
  ...plan.changes.modified.map((c) => c.key),
]

/**
 * Block list for one library: selected members contribute their fresh text, the others their
 * previous block when there was one. Members that never existed and were not selected are left out.
 */
export const rebuildLibraryBlocks = (
  plan: LibraryPlan,
  selected: ReadonlySet<string>,
): { readonly blocks: ReadonlyArray<string>; readonly omitted: ReadonlyArray<string> } => {
  const desiredNames = new Set(plan.members.flatMap((m) => (m.desired ? [m.desired.symbolName] : [])))
  const emitted = new Set<string>()
  const blocks: string[] = []
  const omitted: string[] = []

  for (const member of plan.members) {
    const key = changeKeyOf(plan.library, member.symbolName)
    if (emitted.has(member.symbolName)) continue
    if (!member.desired && desiredNames.has(member.symbolName)) continue

    if (member.desired && selected.has(key)) {
      blocks.push(member.desired.text)
      emitted.add(member.symbolName)
      continue
    }

    const prior = plan.existing.symbols.get(member.symbolName)
    if (prior !== undefined) {
      blocks.push(prior)
      emitted.add(member.symbolName)
      continue
    }

    omitted.push(key)
  }

  return { blocks, omitted }
}

/**
 * Writes every library that holds at least one selected change. Each file is rebuilt whole and
 * replaced atomically; libraries without a selected change are not touched.
 */
export const commitReconcile = (
  plan: ReconcilePlan,
  selection: Iterable<string>,
): Effect.Effect<WriteBackResultV1, SymbolEngineError> =>
  Effect.gen(function* () {
    const known = new Set(allChangeKeys(plan))
    const selected = new Set<string>()
    for (const key of selection) {
      if (!known.has(key)) {
        return yield* Effect.fail(
          makeSymbolEngineError({
            code: 'SELECTION_UNKNOWN',
            message: `selected change "${key}" is not part of the plan`,
            hint: 'Select keys listed under changes.new or changes.modified.',
          }),
        )
      }
      selected.add(key)
    }

    const touched = plan.libraries.filter((l) =>
      l.members.some((m) => m.desired !== undefined && selected.has(changeKeyOf(l.library, m.symbolName))),
    )

    if (touched.length === 0) {
      yield* Effect.logInfo('reconcile commit: nothing selected')
      return {
        schemaVersion: 1,
        kind: 'WriteBackResult',
        mode: 'write',
        modifiedFiles: [],
        committed: [],
        omitted: [],
      } satisfies WriteBackResultV1
    }

    yield* ensureDir(plan.outputDir)

    const modifiedFiles: Array<WriteBackResultV1['modifiedFiles'][number]> = []
    const omitted: Array<WriteBackResultV1['omitted'][number]> = []

    for (const library of touched) {
      const rebuilt = rebuildLibraryBlocks(library, selected)
      const filePath = path.join(plan.outputDir, library.fileName)
      yield* writeFileAtomic(filePath, renderLibrary(plan.header, rebuilt.blocks)).pipe(
        Effect.tap(() =>
          Effect.logInfo(`wrote ${library.fileName} (${rebuilt.blocks.length} symbols)`).pipe(
            Effect.annotateLogs({ library: library.library }),
          ),
        ),
      )
      modifiedFiles.push({
        file: library.fileName,
        library: library.library,
        changeKind: library.existing.exists ? 'updated' : 'created',
        symbols: rebuilt.blocks.length,
      })
      omitted.push(...rebuilt.omitted.map((key) => ({ key, reasonCodes: [ReasonCodes.omittedUnselected] })))
    }

    return {
      schemaVersion: 1,
      kind: 'WriteBackResult',
      mode: 'write',
      modifiedFiles,
      committed: allChangeKeys(plan).filter((k) => selected.has(k)),
      omitted,
    } satisfies WriteBackResultV1
  })

export const toReconcileReport = (plan: ReconcilePlan): ReconcileReportV1 => ({
  schemaVersion: 1,
  kind: 'ReconcileReport',
  libraries: plan.libraries.map((l) => ({
    library: l.library,
    file: l.fileName,
    exists: l.existing.exists,
    existingSymbols: l.existing.symbols.size,
    records: l.members.length,
  })),
  changes: plan.changes,
  diagnostics: plan.diagnostics,
  summary: plan.summary,
})

/** Planning and commit bound to one configuration. */
export type Reconciler = {
  readonly plan: Effect.Effect<ReconcilePlan, Error, PartSource>
  readonly commit: (plan: ReconcilePlan, selection: Iterable<string>) => Effect.Effect<WriteBackResultV1, SymbolEngineError>
}

export const makeReconciler = (config: ReconcilerConfig): Reconciler => ({
  plan: planReconcile(config),
  commit: commitReconcile,
})
