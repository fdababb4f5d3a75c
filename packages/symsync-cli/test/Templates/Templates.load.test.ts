import fs from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { Effect, Either } from 'effect'
import { describe, expect, it } from 'vitest'

import { silentLoggerLayer } from '../../src/internal/logger.js'
import { loadTemplatesFile } from '../../src/internal/templatesFile.js'
import { resistorTemplatesYaml, withTmp } from '../helpers/fakePartDb.js'

const load = (filePath: string) => Effect.runPromise(Effect.either(loadTemplatesFile(filePath)).pipe(Effect.provide(silentLoggerLayer)))

describe('templates file', () => {
  it('loads templates in file order', async () => {
    await withTmp('symsync-templates-order-', async (tmp) => {
      const file = path.join(tmp, 'templates.yaml')
      const opAmp = `  opamp:\n    applies_to_categories: [OpAmp]\n    symbol_generator: IC_Box\n    power_pin_names: [VCC, GND]\n`
      await fs.writeFile(file, `${resistorTemplatesYaml}${opAmp}`, 'utf8')

      const result = await load(file)
      if (Either.isLeft(result)) throw new Error(result.left.message)
      expect(result.right.map((t) => [t.name, t.generator])).toEqual([
        ['resistor', 'STATIC'],
        ['opamp', 'IC_BOX'],
      ])
      expect(result.right[0]?.fieldMapping).toEqual([
        ['Reference', "'R'"],
        ['Value', 'Resistance'],
      ])
      expect(result.right[0]?.symbolOptions).toBe('(pin_numbers hide)')
      expect(result.right[1]?.powerPinNames).toEqual(['VCC', 'GND'])
    })
  })

  it('decodes the example templates shipped with the repository', async () => {
    const file = fileURLToPath(new URL('../../../../examples/templates.example.yaml', import.meta.url))
    const result = await load(file)
    if (Either.isLeft(result)) throw new Error(result.left.message)
    expect(result.right.map((t) => [t.name, t.generator])).toEqual([
      ['opamp', 'IC_BOX'],
      ['header', 'CONNECTOR'],
      ['resistor', 'STATIC'],
    ])
  })

  it('reports invalid YAML as input error', async () => {
    await withTmp('symsync-templates-yaml-', async (tmp) => {
      const file = path.join(tmp, 'templates.yaml')
      await fs.writeFile(file, 'templates: [\n', 'utf8')
      const result = await load(file)
      if (Either.isRight(result)) throw new Error('expected failure')
      expect(result.left).toMatchObject({ code: 'CLI_INVALID_INPUT' })
      expect(result.left.message.startsWith(`templates file is not valid YAML: ${file}`)).toBe(true)
    })
  })

  it('reports a document without templates', async () => {
    await withTmp('symsync-templates-shape-', async (tmp) => {
      const file = path.join(tmp, 'templates.yaml')
      await fs.writeFile(file, 'parts: []\n', 'utf8')
      const result = await load(file)
      if (Either.isRight(result)) throw new Error('expected failure')
      expect(result.left).toMatchObject({ code: 'TEMPLATE_CONFIG_INVALID' })
    })
  })

  it('reports a missing file', async () => {
    const result = await load('/nonexistent/symsync/templates.yaml')
    if (Either.isRight(result)) throw new Error('expected failure')
    expect(result.left.message.startsWith('cannot read templates file: /nonexistent/symsync/templates.yaml')).toBe(true)
  })
})
