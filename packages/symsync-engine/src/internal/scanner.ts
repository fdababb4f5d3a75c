import { unescapeQuoted } from './format.js'

export type ScannedBlock = {
  readonly name: string
  readonly start: number
  readonly end: number
  readonly text: string
}

export type ScanResult = {
  readonly blocks: ReadonlyArray<ScannedBlock>
  readonly unclosed: ReadonlyArray<{ readonly name: string; readonly start: number }>
}

const symbolOpenRe = /\(\s*symbol\s+"((?:[^"\\]|\\.)*)"/g

// A quote preceded by an odd run of backslashes is part of the string.
const isEscaped = (text: string, index: number): boolean => {
  let run = 0
  for (let i = index - 1; i >= 0 && text.charAt(i) === '\\'; i--) run += 1
  return run % 2 === 1
}

/**
 * Index of the `)` closing the `(` at `start`, or -1 when the text ends first.
 * Parentheses inside double-quoted strings do not count.
 */
export const findBlockEnd = (text: string, start: number): number => {
  let depth = 0
  let inString = false
  for (let i = start; i < text.length; i++) {
    const ch = text.charAt(i)
    if (ch === '"' && !isEscaped(text, i)) {
      inString = !inString
      continue
    }
    if (inString) continue
    if (ch === '(') {
      depth += 1
    } else if (ch === ')') {
      depth -= 1
      if (depth === 0) return i
    }
  }
  return -1
}

export const isBalancedBlock = (text: string): boolean => text.startsWith('(') && findBlockEnd(text, 0) === text.length - 1

const unitSuffixRe = /^_\d+_\d+$/

const isUnitOf = (name: string, parents: ReadonlyArray<string>): boolean =>
  parents.some((parent) => name.startsWith(parent) && unitSuffixRe.test(name.slice(parent.length)))

/**
 * Top-level `(symbol "NAME" ...)` blocks in order of appearance.
 * Matches that fall inside an extracted block (unit sub-symbols) are skipped, and so are
 * `NAME_N_M` units that follow an unclosed `NAME`.
 */
export const scanSymbolBlocks = (text: string): ScanResult => {
  const blocks: ScannedBlock[] = []
  const unclosed: Array<{ readonly name: string; readonly start: number }> = []
  let coveredUntil = -1

  for (const match of text.matchAll(symbolOpenRe)) {
    const start = match.index
    if (start === undefined || start <= coveredUntil) continue
    const name = unescapeQuoted(match[1] ?? '')
    if (isUnitOf(name, unclosed.map((u) => u.name))) continue
    const end = findBlockEnd(text, start)
    if (end < 0) {
      unclosed.push({ name, start })
      continue
    }
    blocks.push({ name, start, end, text: text.slice(start, end + 1) })
    coveredUntil = end
  }

  return { blocks, unclosed }
}
