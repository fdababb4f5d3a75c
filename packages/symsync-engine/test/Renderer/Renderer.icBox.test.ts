import { describe, expect, it } from 'vitest'

import { buildProperties, renderSymbol } from '../../src/Renderer.js'
import { lm358, opAmpTemplate } from '../helpers/fixtures.js'

describe('Renderer.renderSymbol (IC box)', () => {
  it('renders the same record twice to identical text', () => {
    expect(renderSymbol(lm358, opAmpTemplate)).toEqual(renderSymbol(lm358, opAmpTemplate))
  })

  it('orders mapped properties first, then remaining parameters', () => {
    expect(buildProperties(lm358, opAmpTemplate)).toEqual([
      ['Reference', 'U'],
      ['Value', 'LM358'],
      ['Description', 'Dual op-amp'],
      ['Manufacturer Partnumber', 'LM358DR'],
      ['Pin Description', 'IN+,IN-,VCC,OUT,GND'],
    ])
  })

  it('places reference, partnumber and description around the box', () => {
    const block = renderSymbol(lm358, opAmpTemplate)
    const lines = block.text.split('\n')

    expect(block.symbolName).toBe('LM358')
    expect(lines[0]).toBe('(symbol "LM358" (in_bom yes) (on_board yes)')
    expect(lines[1]).toBe(
      '    (property "Reference" "U" (at -7.62 6.35 0) (effects (font (size 1.5 1.5)) (justify left)))',
    )
    expect(lines[2]).toBe('    (property "Value" "LM358" (at 0 -2.54 0) (effects (font (size 1.27 1.27))))')
    expect(lines[3]).toBe(
      '    (property "Description" "Dual op-amp" (at -7.62 -8.89 0) (effects (font (size 1.27 1.27)) (justify left)))',
    )
    expect(lines[4]).toBe(
      '    (property "Manufacturer Partnumber" "LM358DR" (at -7.62 -6.35 0) (effects (font (size 1.27 1.27)) (justify left)))',
    )
    expect(lines[5]).toBe(
      '    (property "Pin Description" "IN+,IN-,VCC,OUT,GND" (at 0 0 0) (effects (font (size 1.27 1.27)) (hide yes)))',
    )
    expect(lines[lines.length - 1]).toBe('  )')
  })

  it('emits a main unit and a power unit', () => {
    const lines = renderSymbol(lm358, opAmpTemplate).text.split('\n')

    expect(lines).toContain('    (symbol "LM358_1_1"')
    expect(lines).toContain('    (symbol "LM358_2_1"')
    expect(lines).toContain('      (rectangle (start -7.62 5.08) (end 7.62 -5.08)')
    expect(lines).toContain('      (rectangle (start -7.62 3.81) (end 7.62 -3.81)')
    expect(lines).toContain('      (pin passive line (at -10.16 1.27 0) (length 2.54)')
    expect(lines).toContain('        (name "IN+" (effects (font (size 1.27 1.27))))')
    expect(lines).toContain('      (pin passive line (at 10.16 0.00 180) (length 2.54)')
    expect(lines).toContain('      (pin power_in line (at -10.16 0.00 0) (length 2.54)')
    expect(lines).toContain('        (number "5" (effects (font (size 1.27 1.27))))')

    const unitB = lines.indexOf('    (symbol "LM358_2_1"')
    expect(lines.slice(unitB).filter((l) => l.includes('(pin ')).length).toBe(2)
  })

  it('escapes quotes in values', () => {
    const record = { ...lm358, attributes: { ...lm358.attributes, description: 'say "hi"' } }
    const lines = renderSymbol(record, opAmpTemplate).text.split('\n')
    expect(lines[3]).toBe(
      '    (property "Description" "say \\"hi\\"" (at -7.62 -8.89 0) (effects (font (size 1.27 1.27)) (justify left)))',
    )
  })

  it('falls back to the same-named field when the mapped path is empty', () => {
    const template = { ...opAmpTemplate, fieldMapping: [['description', 'missing_field'] as const] }
    expect(buildProperties(lm358, template)[0]).toEqual(['description', 'Dual op-amp'])
  })
})
