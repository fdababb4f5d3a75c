import { Context, Effect, Layer } from 'effect'

import type { PartRecord } from './internal/model.js'

export type { AttributeValue, PartRecord } from './internal/model.js'

/** Where part records come from (an inventory API in the CLI, fixed lists in tests). */
export class PartSource extends Context.Tag('@symsync/engine/PartSource')<PartSource, PartSource.Service>() {}

export declare namespace PartSource {
  export interface Service {
    readonly fetchParts: Effect.Effect<ReadonlyArray<PartRecord>, Error>
  }
}

export const fromRecords = (records: ReadonlyArray<PartRecord>): Layer.Layer<PartSource> =>
  Layer.succeed(PartSource, { fetchParts: Effect.succeed(records) })
