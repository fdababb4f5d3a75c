import { Extractor } from '@symsync/engine'
import { Effect } from 'effect'
import * as yaml from 'js-yaml'

import { makeArtifactOutput } from '../artifacts.js'
import type { CliInvocation } from '../args.js'
import { asSerializableErrorSummary } from '../errors.js'
import { readTextFile } from '../output.js'
import { makeCommandResult, makeErrorCommandResult, type CommandResult, type TemplateExtractV1 } from '../result.js'

type TemplateExtractInvocation = Extract<CliInvocation, { readonly command: 'template.extract' }>

export const runTemplateExtract = (inv: TemplateExtractInvocation): Effect.Effect<CommandResult, never> => {
  const runId = inv.global.runId

  return Effect.gen(function* () {
    const libraryText = yield* readTextFile(inv.libraryFile, 'symbol library')
    const extracted = yield* Extractor.extractTemplate(libraryText, inv.symbol)
    const templateName = inv.templateName ?? inv.symbol
    const entry = Extractor.toTemplateEntry(extracted, { categories: inv.categories })

    const value: TemplateExtractV1 = {
      schemaVersion: 1,
      kind: 'TemplateExtract',
      templateName,
      symbolName: extracted.symbolName,
      entry,
      yaml: yaml.dump({ templates: { [templateName]: entry } }, { lineWidth: -1 }),
    }
    const artifact = yield* makeArtifactOutput({
      outDir: inv.global.outDir,
      budgetBytes: inv.global.budgetBytes,
      outputKey: 'templateExtract',
      value,
    })

    return makeCommandResult({ runId, command: 'template.extract', artifacts: [artifact] })
  }).pipe(
    Effect.annotateLogs({ command: 'template.extract' }),
    Effect.catchAll((cause) =>
      Effect.succeed(makeErrorCommandResult({ runId, command: 'template.extract', error: asSerializableErrorSummary(cause) })),
    ),
  )
}
