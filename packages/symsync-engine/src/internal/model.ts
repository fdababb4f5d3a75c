export type AttributeValue =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<AttributeValue>
  | { readonly [key: string]: AttributeValue }

/**
 * One part as delivered by a part source. The engine never mutates it.
 *
 * `parameters` keeps the order the source delivered: it decides the order of appended properties.
 */
export type PartRecord = {
  readonly id: string
  readonly name: string
  readonly categoryPath: string
  readonly attributes: Readonly<Record<string, AttributeValue>>
  readonly parameters: ReadonlyArray<readonly [name: string, value: string]>
}

export type GeneratorKind = 'NONE' | 'STATIC' | 'IC_BOX' | 'CONNECTOR'

export type Template = {
  readonly name: string
  readonly appliesToCategories: ReadonlyArray<string>
  readonly fieldMapping: ReadonlyArray<readonly [property: string, source: string]>
  readonly propertyTemplates: Readonly<Record<string, string>>
  readonly generator: GeneratorKind
  readonly powerPinNames: ReadonlyArray<string>
  readonly symbolOptions: string
  readonly symbolTemplate?: string
}

export type TemplateSet = ReadonlyArray<Template>

export type SymbolBlock = {
  readonly symbolName: string
  readonly text: string
}

export type DiagnosticSeverity = 'warning' | 'error'

export type Diagnostic = {
  readonly code: string
  readonly severity: DiagnosticSeverity
  readonly message: string
  readonly library?: string
  readonly symbol?: string
  readonly recordId?: string
}
