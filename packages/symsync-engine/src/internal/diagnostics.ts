import { Effect } from 'effect'

import type { Diagnostic } from './model.js'

export const logDiagnostic = (d: Diagnostic): Effect.Effect<void> =>
  (d.severity === 'error' ? Effect.logError(d.message) : Effect.logWarning(d.message)).pipe(
    Effect.annotateLogs({
      code: d.code,
      ...(d.library ? { library: d.library } : null),
      ...(d.symbol ? { symbol: d.symbol } : null),
      ...(d.recordId ? { recordId: d.recordId } : null),
    }),
  )

export const logDiagnostics = (ds: ReadonlyArray<Diagnostic>): Effect.Effect<void> =>
  Effect.forEach(ds, logDiagnostic, { discard: true })
