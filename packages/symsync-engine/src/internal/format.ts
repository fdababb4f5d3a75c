/** Fixed two-decimal coordinate text; never prints `-0.00`. */
export const fixed2 = (value: number): string => {
  const text = value.toFixed(2)
  return text === '-0.00' ? '0.00' : text
}

export const collapseWhitespace = (text: string): string => text.split(/\s+/).filter((s) => s.length > 0).join(' ')

const sexprSpacingRe = /"(?:[^"\\]|\\.)*"|\(\s+|\s+\)|\s+/g

/** One-line s-expression: whitespace runs become one space, none next to a paren; strings untouched. */
export const compactSexpr = (text: string): string =>
  text
    .replace(sexprSpacingRe, (m) => (m.startsWith('"') ? m : m.startsWith('(') ? '(' : m.endsWith(')') ? ')' : ' '))
    .trim()

export const escapeQuoted = (value: string): string => value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')

export const unescapeQuoted = (value: string): string => value.replace(/\\(.)/gs, '$1')

export const capitalizeFirst = (s: string): string => (s.length === 0 ? s : `${s.charAt(0).toUpperCase()}${s.slice(1)}`)
