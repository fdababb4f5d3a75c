// Public barrel for @symsync/engine
//   import * as SymSync from '@symsync/engine'
// exposes Resolver / Geometry / Renderer / LibraryParser / Differ / Templates / Reconciler / Extractor.

export * as Resolver from './Resolver.js'
export * as Geometry from './Geometry.js'
export * as Renderer from './Renderer.js'
export * as LibraryParser from './LibraryParser.js'
export * as Differ from './Differ.js'
export * as Templates from './Templates.js'
export * as Reconciler from './Reconciler.js'
export * as Extractor from './Extractor.js'

export { PartSource, fromRecords } from './PartSource.js'
export { SymbolEngineError, isSymbolEngineError, makeSymbolEngineError } from './internal/errors.js'
export type { SymbolEngineErrorCode } from './internal/errors.js'
export type {
  AttributeValue,
  Diagnostic,
  DiagnosticSeverity,
  GeneratorKind,
  PartRecord,
  SymbolBlock,
  Template,
  TemplateSet,
} from './internal/model.js'
