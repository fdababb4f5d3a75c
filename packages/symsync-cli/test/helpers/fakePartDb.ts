import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

import type { FetchLike } from '../../src/internal/partDb.js'

export const API_URL = 'http://partdb.test'

export type RecordedRequest = { readonly url: string; readonly headers: Readonly<Record<string, string>> }

/**
 * In-process Part-DB: answers each URL from `routes`, 404 for anything else, and records every
 * request it sees.
 */
export const makeFakePartDb = (routes: Readonly<Record<string, { readonly status?: number; readonly body: unknown }>>) => {
  const requests: RecordedRequest[] = []
  const fetch: FetchLike = async (url, init) => {
    requests.push({ url, headers: init.headers })
    const route = routes[url]
    if (!route) return new Response(JSON.stringify({ detail: 'not found' }), { status: 404 })
    return new Response(JSON.stringify(route.body), { status: route.status ?? 200 })
  }
  return { fetch, requests }
}

export const pageUrl = (page: number, suffix = ''): string =>
  `${API_URL}/api/parts?page=${page}&itemsPerPage=500&order%5Bname%5D=asc${suffix}`

export const resistorPart = {
  '@id': '/api/parts/201',
  id: 201,
  name: 'R 10k',
  description: 'Thick film',
  category: { name: 'Resistors', full_path: 'Passives → Resistors' },
  parameters: [{ '@id': '/api/parameters/7' }],
}

export const resistanceParameter = { '@id': '/api/parameters/7', name: 'Resistance', value_text: '10k' }

export const resistorTemplatesYaml = `templates:
  resistor:
    applies_to_categories: [Resistors]
    field_mapping:
      Reference: "'R'"
      Value: Resistance
    property_templates:
      Reference: '(property "Reference" "{VALUE}" (at 2.03 0 90) (effects (font (size 1.27 1.27))))'
    symbol_options: (pin_numbers hide)
    symbol_template: |
      (symbol "Resistor_0_1"
        (rectangle (start -1.02 2.54) (end 1.02 -2.54)
          (stroke (width 0.254) (type default))
          (fill (type none))
        )
      )
`

export const makeTmpDir = (prefix: string): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), prefix))

export const withTmp = async (prefix: string, body: (dir: string) => Promise<void>): Promise<void> => {
  const tmp = await makeTmpDir(prefix)
  try {
    await body(tmp)
  } finally {
    await fs.rm(tmp, { recursive: true, force: true })
  }
}
