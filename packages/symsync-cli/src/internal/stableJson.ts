import type { JsonValue } from './result.js'

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> => typeof value === 'object' && value !== null

/**
 * JSON form of `value` with object keys sorted at every depth, so equal values print identically.
 * `undefined`, functions and symbols drop out of objects and turn into `null` inside arrays;
 * non-finite numbers are `null` and bigints their decimal text.
 */
export const toStableJson = (value: unknown): JsonValue | undefined => {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value
    case 'number':
      return Number.isFinite(value) ? value : null
    case 'bigint':
      return value.toString()
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined
  }
  if (Array.isArray(value)) return value.map((item: unknown) => toStableJson(item) ?? null)
  if (!isRecord(value)) return null

  const out: Record<string, JsonValue> = {}
  for (const key of Object.keys(value).sort()) {
    const item = toStableJson(value[key])
    if (item !== undefined) out[key] = item
  }
  return out
}

export const stableStringifyJson = (value: unknown, space?: number): string => JSON.stringify(toStableJson(value) ?? null, null, space)
