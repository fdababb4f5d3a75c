import { Effect, Either } from 'effect'
import { describe, expect, it } from 'vitest'

import { extractTemplate, toTemplateEntry } from '../../src/Extractor.js'
import { libraryHeaderOf, renderLibrary } from '../../src/Reconciler.js'
import { renderSymbol } from '../../src/Renderer.js'
import { decodeTemplateSet } from '../../src/Templates.js'
import { makeRecord, r10k, resistorBody, resistorTemplate } from '../helpers/fixtures.js'

const libraryText = renderLibrary(libraryHeaderOf({}), [renderSymbol(r10k, resistorTemplate).text])

// Current editor output: one option per line, properties spread over several lines.
const ledLibrary = [
  '(kicad_symbol_lib',
  '  (version 20231120)',
  '  (generator "kicad_symbol_editor")',
  '  (symbol "LED_Red"',
  '    (pin_numbers',
  '      (hide yes)',
  '    )',
  '    (pin_names',
  '      (offset 1.016)',
  '    )',
  '    (exclude_from_sim no)',
  '    (in_bom yes)',
  '    (on_board yes)',
  '    (property "Reference" "D"',
  '      (at 0 2.54 0)',
  '      (effects (font (size 1.27 1.27)))',
  '    )',
  '    (symbol "LED_Red_1_1"',
  '      (pin passive line',
  '        (at -3.81 0 0)',
  '        (length 2.54)',
  '      )',
  '    )',
  '    (embedded_fonts no)',
  '  )',
  ')',
].join('\n')

const decodeEntry = async (entry: ReturnType<typeof toTemplateEntry>) => {
  const [template] = await Effect.runPromise(decodeTemplateSet({ templates: { extracted: entry } }))
  if (!template) throw new Error('expected a template')
  return template
}

describe('Extractor.extractTemplate', () => {
  it('splits a symbol into options, property patterns and body', async () => {
    const extracted = await Effect.runPromise(extractTemplate(libraryText, 'R_10k'))

    expect(extracted.symbolOptions).toBe('(pin_numbers hide)')
    expect(extracted.properties).toEqual([
      {
        name: 'Reference',
        value: 'R',
        pattern: '(property "Reference" "{VALUE}" (at 2.03 0 90) (effects (font (size 1.27 1.27))))',
      },
      {
        name: 'Value',
        value: '10k',
        pattern: '(property "Value" "{VALUE}" (at 0 0 0) (effects (font (size 1.27 1.27)) (hide yes)))',
      },
      {
        name: 'Resistance',
        value: '10k',
        pattern: '(property "Resistance" "{VALUE}" (at 0 0 0) (effects (font (size 1.27 1.27)) (hide yes)))',
      },
    ])
    expect(extracted.symbolTemplate).toBe(resistorBody.replace(/Resistor_/g, 'R_10k_'))
  })

  it('reads options from their own lines and keeps only units and pins in the body', async () => {
    const extracted = await Effect.runPromise(extractTemplate(ledLibrary, 'LED_Red'))

    expect(extracted.symbolOptions).toBe('(pin_numbers (hide yes)) (pin_names (offset 1.016)) (exclude_from_sim no)')
    expect(extracted.properties).toEqual([
      { name: 'Reference', value: 'D', pattern: '(property "Reference" "{VALUE}" (at 0 2.54 0) (effects (font (size 1.27 1.27))))' },
    ])
    expect(extracted.symbolTemplate).toBe(
      ['(symbol "LED_Red_1_1"', '  (pin passive line', '    (at -3.81 0 0)', '    (length 2.54)', '  )', ')'].join('\n'),
    )
  })

  it('renders a multi-line symbol again with each option once', async () => {
    const extracted = await Effect.runPromise(extractTemplate(ledLibrary, 'LED_Red'))
    const template = await decodeEntry(toTemplateEntry(extracted, { categories: ['LEDs'] }))
    const text = renderSymbol(makeRecord({ name: 'LED Red', categoryPath: 'Optoelectronics/LEDs' }), template).text

    expect(text.split('\n')).toEqual([
      '(symbol "LED_Red" (pin_numbers (hide yes)) (pin_names (offset 1.016)) (exclude_from_sim no) (in_bom yes) (on_board yes)',
      '    (property "Reference" "D" (at 0 2.54 0) (effects (font (size 1.27 1.27))))',
      '    (symbol "LED_Red_1_1"',
      '      (pin passive line',
      '        (at -3.81 0 0)',
      '        (length 2.54)',
      '      )',
      '    )',
      '  )',
    ])
    expect(text.split('(in_bom yes)')).toHaveLength(2)
  })

  it('fails for a symbol the library does not contain', async () => {
    const result = await Effect.runPromise(Effect.either(extractTemplate(libraryText, 'C_100n')))
    if (Either.isRight(result)) throw new Error('expected failure')
    expect(result.left.code).toBe('SYMBOL_NOT_FOUND')
  })
})

describe('Extractor.toTemplateEntry', () => {
  it('maps every extracted property to a starter source', async () => {
    const extracted = await Effect.runPromise(extractTemplate(libraryText, 'R_10k'))
    const entry = toTemplateEntry(extracted, { categories: ['Resistors'] })

    expect(entry.field_mapping).toEqual({ Reference: "'R'", Value: 'name', Resistance: 'Resistance' })
    expect(entry.applies_to_categories).toEqual(['Resistors'])
  })

  it('uses Part-DB field names for the standard properties', async () => {
    const symbol = [
      '(symbol "U1" (in_bom yes) (on_board yes)',
      '  (property "Reference" "U" (at 0 0 0))',
      '  (property "Footprint" "SOIC-8" (at 0 0 0))',
      '  (property "Datasheet" "~" (at 0 0 0))',
      '  (property "Description" "" (at 0 0 0))',
      '  (property "Manufacturer Partnumber" "X1" (at 0 0 0))',
      ')',
    ].join('\n')
    const extracted = await Effect.runPromise(extractTemplate(symbol, 'U1'))

    expect(toTemplateEntry(extracted).field_mapping).toEqual({
      Reference: "'U'",
      Footprint: 'footprint.name',
      Datasheet: 'manufacturer_product_url',
      Description: 'description',
      'Manufacturer Partnumber': 'manufacturer_product_number',
    })
  })

  it('renders the part again through the starter mapping alone', async () => {
    const extracted = await Effect.runPromise(extractTemplate(libraryText, 'R_10k'))
    const template = await decodeEntry(toTemplateEntry(extracted, { categories: ['Resistors'] }))

    expect(template.generator).toBe('STATIC')
    expect(template.appliesToCategories).toEqual(['Resistors'])
    expect(renderSymbol(r10k, template).text).toBe(
      renderSymbol(r10k, resistorTemplate).text.replace('(property "Value" "10k"', '(property "Value" "R 10k"'),
    )
  })
})
