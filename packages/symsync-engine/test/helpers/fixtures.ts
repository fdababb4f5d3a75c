import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

import { Logger } from 'effect'

import type { PartRecord, Template } from '../../src/internal/model.js'

export const makeRecord = (
  input: Pick<PartRecord, 'name' | 'categoryPath'> & Partial<Omit<PartRecord, 'name' | 'categoryPath'>>,
): PartRecord => ({
  id: input.id ?? input.name,
  name: input.name,
  categoryPath: input.categoryPath,
  attributes: input.attributes ?? {},
  parameters: input.parameters ?? [],
})

export const opAmpTemplate: Template = {
  name: 'opamp',
  appliesToCategories: ['OpAmp'],
  fieldMapping: [
    ['Reference', "'U'"],
    ['Value', 'name'],
    ['Description', 'description'],
    ['Manufacturer Partnumber', 'manufacturer_product_number'],
  ],
  propertyTemplates: {
    Reference: '(property "Reference" "{VALUE}" (at 0 0 0) (effects (font (size 1.5 1.5))))',
    Value: '(property "Value" "{VALUE}" (at 0 -2.54 0)\n  (effects (font (size 1.27 1.27))))',
  },
  generator: 'IC_BOX',
  powerPinNames: ['VCC', 'GND'],
  symbolOptions: '',
}

export const resistorBody = [
  '(symbol "Resistor_0_1"',
  '  (rectangle (start -1.02 2.54) (end 1.02 -2.54)',
  '    (stroke (width 0.254) (type default))',
  '    (fill (type none))',
  '  )',
  ')',
  '(symbol "Resistor_1_1"',
  '  (pin passive line (at 0 3.81 270) (length 1.27)',
  '    (name "~" (effects (font (size 1.27 1.27))))',
  '    (number "1" (effects (font (size 1.27 1.27))))',
  '  )',
  ')',
].join('\n')

export const resistorTemplate: Template = {
  name: 'resistor',
  appliesToCategories: ['Resistors'],
  fieldMapping: [
    ['Reference', "'R'"],
    ['Value', 'Resistance'],
  ],
  propertyTemplates: {
    Reference: '(property "Reference" "{VALUE}" (at 2.03 0 90) (effects (font (size 1.27 1.27))))',
  },
  generator: 'STATIC',
  powerPinNames: [],
  symbolOptions: '(pin_numbers hide)',
  symbolTemplate: resistorBody,
}

export const lm358 = makeRecord({
  id: '101',
  name: 'LM358',
  categoryPath: 'ICs/OpAmp',
  attributes: { description: 'Dual op-amp', manufacturer_product_number: 'LM358DR' },
  parameters: [['Pin Description', 'IN+,IN-,VCC,OUT,GND']],
})

export const tl072 = makeRecord({
  id: '102',
  name: 'TL072',
  categoryPath: 'ICs/OpAmp',
  attributes: { description: 'JFET op-amp', manufacturer_product_number: 'TL072CP' },
  parameters: [['Pin Description', 'OUT1,IN1-,IN1+,VEE,IN2+,IN2-,OUT2,VCC']],
})

export const r10k = makeRecord({
  id: '201',
  name: 'R 10k',
  categoryPath: 'Passives/Resistors',
  parameters: [['Resistance', '10k']],
})

export const makeTmpDir = (prefix: string): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), prefix))

export type CapturedLog = { readonly level: string; readonly message: string }

/** Logger layer that records every log line instead of printing it. */
export const captureLogs = (sink: CapturedLog[]) =>
  Logger.replace(
    Logger.defaultLogger,
    Logger.make(({ logLevel, message }) => {
      const text = Array.isArray(message) ? message.map((m) => String(m)).join(' ') : String(message)
      sink.push({ level: logLevel.label, message: text })
    }),
  )
