import { Effect, ParseResult, Schema } from 'effect'

import { isSymbolEngineError, makeSymbolEngineError, type SymbolEngineError } from './internal/errors.js'
import type { GeneratorKind, Template, TemplateSet } from './internal/model.js'

export type { GeneratorKind, Template, TemplateSet } from './internal/model.js'

export const LIBRARY_EXTENSION = '.kicad_sym'

const StringMap = Schema.Record({ key: Schema.String, value: Schema.String })

const TemplateEntrySchema = Schema.Struct({
  applies_to_categories: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
  field_mapping: Schema.optional(Schema.NullOr(StringMap)),
  property_templates: Schema.optional(Schema.NullOr(StringMap)),
  symbol_generator: Schema.optional(Schema.NullOr(Schema.String)),
  symbol_template: Schema.optional(Schema.NullOr(Schema.String)),
  symbol_options: Schema.optional(Schema.NullOr(Schema.String)),
  power_pin_names: Schema.optional(Schema.NullOr(Schema.Array(Schema.String))),
})

export const TemplateDocumentSchema = Schema.Struct({
  templates: Schema.Record({ key: Schema.String, value: TemplateEntrySchema }),
})

export type TemplateEntry = Schema.Schema.Type<typeof TemplateEntrySchema>
export type TemplateDocument = Schema.Schema.Type<typeof TemplateDocumentSchema>

const generatorOf = (name: string, entry: TemplateEntry): GeneratorKind => {
  const raw = entry.symbol_generator?.trim().toLowerCase()
  if (raw === 'ic_box') return 'IC_BOX'
  if (raw === 'connector') return 'CONNECTOR'
  if (raw !== undefined && raw.length > 0) {
    throw makeSymbolEngineError({
      code: 'TEMPLATE_CONFIG_INVALID',
      message: `template "${name}": unknown symbol_generator "${entry.symbol_generator ?? ''}"`,
      hint: 'Use IC_Box or Connector, or drop symbol_generator and provide symbol_template.',
    })
  }
  return entry.symbol_template && entry.symbol_template.trim().length > 0 ? 'STATIC' : 'NONE'
}

export const toTemplate = (name: string, entry: TemplateEntry): Template => {
  const symbolTemplate = entry.symbol_template ?? undefined
  return {
    name,
    appliesToCategories: entry.applies_to_categories ?? [],
    fieldMapping: Object.entries(entry.field_mapping ?? {}),
    propertyTemplates: entry.property_templates ?? {},
    generator: generatorOf(name, entry),
    powerPinNames: entry.power_pin_names ?? [],
    symbolOptions: (entry.symbol_options ?? '').trim(),
    ...(symbolTemplate !== undefined ? { symbolTemplate } : null),
  }
}

/** Decodes a parsed template document (`templates:` mapping) keeping declaration order. */
export const decodeTemplateSet = (input: unknown): Effect.Effect<TemplateSet, SymbolEngineError> =>
  Schema.decodeUnknown(TemplateDocumentSchema)(input).pipe(
    Effect.mapError((error) =>
      makeSymbolEngineError({
        code: 'TEMPLATE_CONFIG_INVALID',
        message: `invalid template document: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
      }),
    ),
    Effect.flatMap((doc) =>
      Effect.try({
        try: () => Object.entries(doc.templates).map(([name, entry]) => toTemplate(name, entry)),
        catch: (cause) =>
          isSymbolEngineError(cause)
            ? cause
            : makeSymbolEngineError({ code: 'TEMPLATE_CONFIG_INVALID', message: 'invalid template document', cause }),
      }),
    ),
  )

/** First template (declaration order) with a category that is a case-insensitive suffix of `categoryPath`. */
export const matchTemplate = (categoryPath: string, templates: TemplateSet): Template | undefined => {
  const path = categoryPath.toLowerCase()
  return templates.find((t) =>
    t.appliesToCategories.some((c) => {
      const suffix = c.trim().toLowerCase()
      return suffix.length > 0 && path.endsWith(suffix)
    }),
  )
}

// Part-DB joins category levels with an arrow; a plain slash only separates levels when no arrow is present.
const arrowSeparatorRe = /\s*→\s*/
const slashSeparatorRe = /\s*\/\s*/

/** Library name from the last category segment: `Active → ICs → Op Amps` is `Op_Amps`, `I/O Expanders` is `I_O_Expanders`. */
export const libraryNameOf = (categoryPath: string): string => {
  const separator = categoryPath.includes('→') ? arrowSeparatorRe : slashSeparatorRe
  const segments = categoryPath.split(separator).filter((s) => s.trim().length > 0)
  const tail = segments[segments.length - 1]?.trim() ?? ''
  const name = tail.replace(/[\s\\/:*?"<>|]+/g, '_')
  return name.length > 0 ? name : 'Uncategorized'
}

export const libraryFileNameOf = (library: string): string => `${library}${LIBRARY_EXTENSION}`
