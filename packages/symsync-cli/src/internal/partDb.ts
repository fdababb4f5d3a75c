import { Effect, Layer, ParseResult, Predicate, Schema } from 'effect'
import { PartSource, type AttributeValue, type PartRecord } from '@symsync/engine'

import { makeCliError, type CliError } from './errors.js'

export const PAGE_SIZE = 500

export type FetchLike = (url: string, init: { readonly headers: Readonly<Record<string, string>> }) => Promise<Response>

export type PartDbOptions = {
  readonly apiUrl: string
  readonly apiToken?: string
  /** `YYYY-MM-DD`; only parts added after this day are fetched. */
  readonly partsAfter?: string
  readonly fetch?: FetchLike
}

const ParameterSchema = Schema.Struct({
  '@id': Schema.optional(Schema.String),
  name: Schema.optional(Schema.NullOr(Schema.String)),
  value_text: Schema.optional(Schema.NullOr(Schema.String)),
})

const CategorySchema = Schema.Struct({
  name: Schema.optional(Schema.NullOr(Schema.String)),
  full_path: Schema.optional(Schema.NullOr(Schema.String)),
})

const PartSchema = Schema.Struct({
  id: Schema.Union(Schema.Number, Schema.String),
  name: Schema.String,
  category: Schema.optional(Schema.NullOr(Schema.Union(CategorySchema, Schema.String))),
  parameters: Schema.optional(Schema.NullOr(Schema.Array(Schema.Union(ParameterSchema, Schema.String)))),
})

const ViewSchema = Schema.Struct({
  'hydra:next': Schema.optional(Schema.String),
  next: Schema.optional(Schema.String),
})

const CollectionSchema = Schema.Struct({
  'hydra:member': Schema.optional(Schema.Array(Schema.Unknown)),
  member: Schema.optional(Schema.Array(Schema.Unknown)),
  'hydra:view': Schema.optional(ViewSchema),
  view: Schema.optional(ViewSchema),
})

type PartPayload = Schema.Schema.Type<typeof PartSchema>
type ParameterRef = Schema.Schema.Type<typeof ParameterSchema> | string

/** `2024-03-09` is sent as `09.03.2024`. */
export const toApiDate = (isoDate: string): string => {
  const [year, month, day] = isoDate.split('-')
  return `${day ?? ''}.${month ?? ''}.${year ?? ''}`
}

export const partsPageUrl = (options: Pick<PartDbOptions, 'apiUrl' | 'partsAfter'>, page: number): string => {
  const params = new URLSearchParams({
    page: String(page),
    itemsPerPage: String(PAGE_SIZE),
    'order[name]': 'asc',
  })
  if (options.partsAfter) params.set('addedDate[after]', toApiDate(options.partsAfter))
  return `${trimBase(options.apiUrl)}/api/parts?${params.toString()}`
}

const trimBase = (apiUrl: string): string => apiUrl.replace(/\/+$/, '')

const headersOf = (options: PartDbOptions): Readonly<Record<string, string>> => ({
  accept: 'application/ld+json',
  ...(options.apiToken ? { authorization: `Bearer ${options.apiToken}` } : null),
})

const getJson = (options: PartDbOptions, url: string): Effect.Effect<unknown, CliError> =>
  Effect.gen(function* () {
    const fetchImpl: FetchLike = options.fetch ?? fetch
    const response = yield* Effect.tryPromise({
      try: () => fetchImpl(url, { headers: headersOf(options) }),
      catch: (cause) => makeCliError({ code: 'CLI_PARTDB_HTTP', message: `request failed: GET ${url}`, cause }),
    })
    if (!response.ok) {
      return yield* Effect.fail(
        makeCliError({
          code: 'CLI_PARTDB_HTTP',
          message: `GET ${url} answered ${response.status}`,
          hint: response.status === 401 ? 'Check --apiToken or SYMSYNC_API_TOKEN.' : undefined,
        }),
      )
    }
    return yield* Effect.tryPromise({
      try: (): Promise<unknown> => response.json(),
      catch: (cause) => makeCliError({ code: 'CLI_PARTDB_INVALID', message: `GET ${url} did not return JSON`, cause }),
    })
  })

const decodeWith =
  <A, I>(schema: Schema.Schema<A, I>, what: string) =>
  (input: unknown): Effect.Effect<A, CliError> =>
    Schema.decodeUnknown(schema)(input).pipe(
      Effect.mapError((error) =>
        makeCliError({
          code: 'CLI_PARTDB_INVALID',
          message: `unexpected ${what}: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
        }),
      ),
    )

const toAttributeValue = (value: unknown): AttributeValue | undefined => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined
  if (Array.isArray(value)) {
    return value.flatMap((v) => {
      const item = toAttributeValue(v)
      return item === undefined ? [] : [item]
    })
  }
  if (Predicate.isRecord(value)) {
    const out: Record<string, AttributeValue> = {}
    for (const [k, v] of Object.entries(value)) {
      const item = toAttributeValue(v)
      if (item !== undefined) out[k] = item
    }
    return out
  }
  return undefined
}

const attributesOf = (raw: unknown): Readonly<Record<string, AttributeValue>> => {
  const out: Record<string, AttributeValue> = {}
  if (!Predicate.isRecord(raw)) return out
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'parameters') continue
    const attr = toAttributeValue(value)
    if (attr !== undefined) out[key] = attr
  }
  return out
}

export const categoryPathOf = (category: PartPayload['category']): string => {
  if (!category || typeof category === 'string') return 'Uncategorized'
  const fullPath = category.full_path?.trim()
  if (fullPath) return fullPath
  const name = category.name?.trim()
  return name ? name : 'Uncategorized'
}

const resolveParameter = (
  options: PartDbOptions,
  ref: ParameterRef,
): Effect.Effect<readonly [string, string] | undefined, CliError> => {
  if (typeof ref !== 'string' && typeof ref.name === 'string' && ref.name.length > 0) {
    return Effect.succeed([ref.name, ref.value_text ? ref.value_text : '-'] as const)
  }
  const iri = typeof ref === 'string' ? ref : ref['@id']
  if (!iri) return Effect.succeed(undefined)

  const url = `${trimBase(options.apiUrl)}${iri}`
  return getJson(options, url).pipe(
    Effect.flatMap(decodeWith(ParameterSchema, `parameter ${iri}`)),
    Effect.map((p): readonly [string, string] | undefined =>
      p.name ? [p.name, p.value_text ? p.value_text : '-'] : undefined,
    ),
    // One unreadable parameter does not sink the part.
    Effect.catchAll((error) =>
      Effect.logWarning(`skipping parameter ${iri}: ${error.message}`).pipe(Effect.as(undefined)),
    ),
  )
}

const toPartRecord = (options: PartDbOptions, raw: unknown): Effect.Effect<PartRecord, CliError> =>
  Effect.gen(function* () {
    const part = yield* decodeWith(PartSchema, 'part')(raw)
    const resolved = yield* Effect.forEach(part.parameters ?? [], (ref) => resolveParameter(options, ref))
    const parameters = resolved.flatMap((p) => (p ? [p] : []))
    return {
      id: String(part.id),
      name: part.name,
      categoryPath: categoryPathOf(part.category),
      attributes: attributesOf(raw),
      parameters,
    } satisfies PartRecord
  })

/** Every page of `/api/parts`, in server order, with parameters resolved. */
export const fetchParts = (options: PartDbOptions): Effect.Effect<ReadonlyArray<PartRecord>, CliError> =>
  Effect.gen(function* () {
    const records: PartRecord[] = []
    let page = 1
    while (true) {
      const url = partsPageUrl(options, page)
      const collection = yield* getJson(options, url).pipe(Effect.flatMap(decodeWith(CollectionSchema, 'parts collection')))
      const members = collection['hydra:member'] ?? collection.member ?? []
      if (members.length === 0) break

      for (const raw of members) records.push(yield* toPartRecord(options, raw))
      yield* Effect.logInfo(`fetched page ${page} (${members.length} parts)`)

      const view = collection['hydra:view'] ?? collection.view
      if (!view || !(view['hydra:next'] ?? view.next)) break
      page += 1
    }
    return records
  }).pipe(Effect.annotateLogs({ source: 'partdb' }))

export const partDbLayer = (options: PartDbOptions): Layer.Layer<PartSource> =>
  Layer.succeed(PartSource, { fetchParts: fetchParts(options) })
