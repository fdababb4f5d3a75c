import { capitalizeFirst } from './internal/format.js'
import type { AttributeValue, PartRecord } from './internal/model.js'

const literalRe = /^'(.*)'$/s

/** `'U'` in a field mapping is the literal `U`. */
export const literalOf = (source: string): string | undefined => {
  const m = literalRe.exec(source.trim())
  return m ? (m[1] ?? '') : undefined
}

const scalarText = (value: AttributeValue | undefined): string => {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return ''
}

const isObject = (value: AttributeValue | undefined): value is { readonly [key: string]: AttributeValue } =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const parameterOf = (record: PartRecord, name: string): string | undefined => {
  for (const [key, value] of record.parameters) {
    if (key === name) return value
  }
  return undefined
}

const fieldOf = (record: PartRecord, name: string): AttributeValue | undefined => {
  switch (name) {
    case 'id':
      return record.id
    case 'name':
      return record.name
    case 'categoryPath':
      return record.categoryPath
  }
  return Object.prototype.hasOwnProperty.call(record.attributes, name) ? record.attributes[name] : undefined
}

const resolvePlain = (record: PartRecord, key: string): string => {
  const field = fieldOf(record, key)
  if (field !== undefined && field !== null) return scalarText(field)
  return parameterOf(record, key) ?? parameterOf(record, capitalizeFirst(key)) ?? ''
}

const resolveDotted = (record: PartRecord, hops: ReadonlyArray<string>): string => {
  const [head, ...rest] = hops
  if (head === undefined) return ''

  let current: AttributeValue | undefined = fieldOf(record, head)
  if (current === undefined || current === null) {
    const fromBag = parameterOf(record, head)
    if (fromBag === undefined) return ''
    current = fromBag
  }

  for (const hop of rest) {
    if (!isObject(current) || !Object.prototype.hasOwnProperty.call(current, hop)) return ''
    current = current[hop]
  }
  return scalarText(current)
}

/**
 * Value of `path` on a part record, `''` when any hop is missing.
 *
 * Plain paths try the typed fields and attributes, then the parameter bag, then the bag again
 * with the first letter capitalized. Dotted paths walk nested attribute objects.
 */
export const resolveValue = (record: PartRecord, path: string): string => {
  const literal = literalOf(path)
  if (literal !== undefined) return literal

  const trimmed = path.trim()
  if (trimmed.length === 0) return ''
  if (!trimmed.includes('.')) return resolvePlain(record, trimmed)
  return resolveDotted(record, trimmed.split('.'))
}
