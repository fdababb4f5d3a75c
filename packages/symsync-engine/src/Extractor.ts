import { Effect } from 'effect'

import { makeSymbolEngineError, type SymbolEngineError } from './internal/errors.js'
import { compactSexpr, unescapeQuoted } from './internal/format.js'
import { findBlockEnd, scanSymbolBlocks } from './internal/scanner.js'
import type { TemplateEntry } from './Templates.js'
import { VALUE_PLACEHOLDER } from './Renderer.js'

export type ExtractedProperty = {
  readonly name: string
  readonly value: string
  /** The property with `{VALUE}` in place of its value, on one line. */
  readonly pattern: string
}

export type ExtractedTemplate = {
  readonly symbolName: string
  readonly symbolOptions: string
  readonly properties: ReadonlyArray<ExtractedProperty>
  readonly symbolTemplate: string
}

const headRe = /^\(\s*([^\s()"]+)/
const propertyRe = /^\(property\s+("((?:[^"\\]|\\.)*)")\s+"((?:[^"\\]|\\.)*)"/s
const symbolHeadRe = /^\(\s*symbol\s+"(?:[^"\\]|\\.)*"/

// The renderer always appends in_bom and on_board itself.
const OPTION_HEADS = new Set(['pin_numbers', 'pin_names', 'exclude_from_sim'])
const BODY_HEADS = new Set(['symbol', 'pin'])

const STARTER_SOURCES = new Map<string, string>([
  ['Value', 'name'],
  ['Description', 'description'],
  ['Footprint', 'footprint.name'],
  ['Datasheet', 'manufacturer_product_url'],
  ['Manufacturer Partnumber', 'manufacturer_product_number'],
])

type Child = { readonly head: string; readonly text: string; readonly column: number }

const columnOf = (text: string, index: number): number => index - (text.lastIndexOf('\n', index - 1) + 1)

// Lines after the first lose the indentation the child had in its file.
const dedent = (child: Child): string =>
  child.text
    .split(/\r?\n/)
    .map((line, i) => {
      if (i === 0) return line
      const lead = /^[ \t]*/.exec(line)?.[0].length ?? 0
      return line.slice(Math.min(lead, child.column))
    })
    .join('\n')

const childrenOf = (block: string): ReadonlyArray<Child> => {
  const head = symbolHeadRe.exec(block)
  const children: Child[] = []
  let i = head ? head[0].length : 1
  while (i < block.length - 1) {
    const ch = block.charAt(i)
    if (ch !== '(') {
      i += 1
      continue
    }
    const end = findBlockEnd(block, i)
    if (end < 0) break
    const text = block.slice(i, end + 1)
    children.push({ head: headRe.exec(text)?.[1] ?? '', text, column: columnOf(block, i) })
    i = end + 1
  }
  return children
}

const propertyOf = (text: string): ExtractedProperty | undefined => {
  const m = propertyRe.exec(text)
  if (!m) return undefined
  return {
    name: unescapeQuoted(m[2] ?? ''),
    value: unescapeQuoted(m[3] ?? ''),
    pattern: compactSexpr(text.replace(propertyRe, () => `(property ${m[1] ?? '""'} "${VALUE_PLACEHOLDER}"`)),
  }
}

/**
 * Splits an existing symbol into the pieces of a STATIC template: the pin and simulation options,
 * property patterns with `{VALUE}` in place of the value, and a body of unit sub-symbols and pins.
 * Any other child is left out.
 */
export const extractTemplate = (libraryText: string, symbolName: string): Effect.Effect<ExtractedTemplate, SymbolEngineError> =>
  Effect.gen(function* () {
    const block = scanSymbolBlocks(libraryText).blocks.find((b) => b.name === symbolName)
    if (!block) {
      return yield* Effect.fail(
        makeSymbolEngineError({
          code: 'SYMBOL_NOT_FOUND',
          message: `symbol "${symbolName}" not found in library`,
        }),
      )
    }

    const options: string[] = []
    const properties: ExtractedProperty[] = []
    const body: string[] = []
    const dropped: string[] = []

    for (const child of childrenOf(block.text)) {
      const property = child.head === 'property' ? propertyOf(child.text) : undefined
      if (property) properties.push(property)
      else if (OPTION_HEADS.has(child.head)) options.push(compactSexpr(child.text))
      else if (BODY_HEADS.has(child.head)) body.push(dedent(child))
      else dropped.push(child.head)
    }

    if (dropped.length > 0) {
      yield* Effect.logDebug(`extract "${symbolName}": left out ${dropped.join(', ')}`)
    }

    return {
      symbolName,
      symbolOptions: options.join(' '),
      properties,
      symbolTemplate: body.join('\n'),
    }
  })

/** Source a new template maps a property from: the reference letter stays literal, the rest follow Part-DB field names. */
export const starterSourceOf = (property: Pick<ExtractedProperty, 'name' | 'value'>): string =>
  property.name === 'Reference' ? `'${property.value}'` : (STARTER_SOURCES.get(property.name) ?? property.name)

/** Template entry in the shape of the template document, ready to be dumped. */
export const toTemplateEntry = (
  extracted: ExtractedTemplate,
  options?: { readonly categories?: ReadonlyArray<string> },
): TemplateEntry => ({
  applies_to_categories: options?.categories ?? [],
  field_mapping: Object.fromEntries(extracted.properties.map((p) => [p.name, starterSourceOf(p)])),
  property_templates: Object.fromEntries(extracted.properties.map((p) => [p.name, p.pattern])),
  ...(extracted.symbolOptions.length > 0 ? { symbol_options: extracted.symbolOptions } : null),
  symbol_template: extracted.symbolTemplate,
})
