import { describe, expect, it } from 'vitest'

import { dedupeOptionTokensLastWins } from '../../src/internal/args.js'

describe('symsync args: last occurrence wins', () => {
  it('keeps the last single-valued flag and every --select', () => {
    expect(
      dedupeOptionTokensLastWins(['--mode', 'report', '--select', 'A/x', '--mode', 'write', '--select', 'B/y', '--quiet']),
    ).toEqual(['--select', 'A/x', '--mode', 'write', '--select', 'B/y', '--quiet'])
  })

  it('lets an explicit flag override a config default placed before it', () => {
    expect(dedupeOptionTokensLastWins(['--outputDir', '/cfg/libs', 'library', 'sync', '--outputDir', 'libs'])).toEqual([
      'library',
      'sync',
      '--outputDir',
      'libs',
    ])
  })
})
