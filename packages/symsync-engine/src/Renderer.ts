import { layoutConnector, layoutIcBox, resolveConnectorShape } from './Geometry.js'
import type { GeometryResult, Overlay, PlacedPin, Point, SymbolUnit } from './Geometry.js'
import { makeSymbolEngineError } from './internal/errors.js'
import { collapseWhitespace, escapeQuoted, fixed2 } from './internal/format.js'
import type { PartRecord, SymbolBlock, Template } from './internal/model.js'
import { isBalancedBlock } from './internal/scanner.js'
import { literalOf, resolveValue } from './Resolver.js'

export type { SymbolBlock } from './internal/model.js'

export const VALUE_PLACEHOLDER = '{VALUE}'
export const PIN_DESCRIPTION_FIELD = 'Pin Description'

const DEFAULT_FONT = '(size 1.27 1.27)'
const fontSizeRe = /\(size\s+([\d.]+)\s+([\d.]+)\)/

const INDENT_PROPERTY = '    '
const INDENT_UNIT_BODY = '      '
const INDENT_UNIT_DETAIL = '        '

export const symbolNameOf = (record: PartRecord): string => record.name.replace(/ /g, '_')

/**
 * Ordered property set: field mappings first (literal, or the source path with a fallback to
 * the same-named field), then every non-empty parameter the mappings did not cover.
 */
export const buildProperties = (record: PartRecord, template: Template): ReadonlyArray<readonly [string, string]> => {
  const props = new Map<string, string>()

  for (const [property, source] of template.fieldMapping) {
    const literal = literalOf(source)
    if (literal !== undefined) {
      props.set(property, literal)
      continue
    }
    const primary = resolveValue(record, source)
    props.set(property, primary.length > 0 ? primary : resolveValue(record, property))
  }

  for (const [name, value] of record.parameters) {
    if (props.has(name) || value.length === 0) continue
    const resolved = resolveValue(record, name)
    props.set(name, resolved.length > 0 ? resolved : value)
  }

  return Array.from(props.entries())
}

export const renderProperty = (name: string, value: string, propertyTemplate: string | undefined): string => {
  if (propertyTemplate !== undefined && propertyTemplate.trim().length > 0) {
    return collapseWhitespace(propertyTemplate).split(VALUE_PLACEHOLDER).join(escapeQuoted(value))
  }
  return `(property "${escapeQuoted(name)}" "${escapeQuoted(value)}" (at 0 0 0) (effects (font ${DEFAULT_FONT}) (hide yes)))`
}

const fontOf = (propertyTemplate: string | undefined): string => {
  const m = propertyTemplate ? fontSizeRe.exec(propertyTemplate) : null
  return m ? `(size ${m[1] ?? '1.27'} ${m[2] ?? '1.27'})` : DEFAULT_FONT
}

const placedProperty = (name: string, value: string, x: number, y: number, propertyTemplate: string | undefined): string =>
  `(property "${escapeQuoted(name)}" "${escapeQuoted(value)}" (at ${fixed2(x)} ${fixed2(y)} 0) (effects (font ${fontOf(propertyTemplate)}) (justify left)))`

/** Reference above the box, partnumber below it, description one grid further down. */
const computedPositions = (geometry: GeometryResult): ReadonlyMap<string, Point> => {
  const first = geometry.units[0]
  const top = first ? first.box.top : 0
  const left = first ? first.box.left : 0
  const partnumberY = -top - 1.27
  return new Map<string, Point>([
    ['Reference', [left, top + 1.27]],
    ['Manufacturer Partnumber', [left, partnumberY]],
    ['Description', [left, partnumberY - 2.54]],
  ])
}

const xy = (p: Point): string => `${fixed2(p[0])} ${fixed2(p[1])}`

const renderOverlay = (overlay: Overlay): ReadonlyArray<string> => {
  const head =
    overlay.kind === 'polyline'
      ? `(polyline (pts ${overlay.points.map((p) => `(xy ${xy(p)})`).join(' ')})`
      : `(arc (start ${xy(overlay.start)}) (mid ${xy(overlay.mid)}) (end ${xy(overlay.end)})`
  return [
    `${INDENT_UNIT_BODY}${head}`,
    `${INDENT_UNIT_DETAIL}(stroke (width 0.2) (type default))`,
    `${INDENT_UNIT_DETAIL}(fill (type none))`,
    `${INDENT_UNIT_BODY})`,
  ]
}

const renderPin = (pin: PlacedPin): ReadonlyArray<string> => {
  const nameEffects = pin.hideName ? `(effects (font ${DEFAULT_FONT}) (hide yes))` : `(effects (font ${DEFAULT_FONT}))`
  return [
    `${INDENT_UNIT_BODY}(pin ${pin.electricalType} line (at ${fixed2(pin.x)} ${fixed2(pin.y)} ${pin.orientation}) (length 2.54)`,
    `${INDENT_UNIT_DETAIL}(name "${escapeQuoted(pin.name)}" ${nameEffects})`,
    `${INDENT_UNIT_DETAIL}(number "${escapeQuoted(pin.number)}" (effects (font ${DEFAULT_FONT})))`,
    `${INDENT_UNIT_BODY})`,
  ]
}

const renderUnit = (symbolName: string, unit: SymbolUnit): ReadonlyArray<string> => [
  `${INDENT_PROPERTY}(symbol "${escapeQuoted(`${symbolName}_${unit.unit}_1`)}"`,
  `${INDENT_UNIT_BODY}(rectangle (start ${fixed2(unit.box.left)} ${fixed2(unit.box.top)}) (end ${fixed2(unit.box.right)} ${fixed2(unit.box.bottom)})`,
  `${INDENT_UNIT_DETAIL}(stroke (width 0.254) (type default))`,
  `${INDENT_UNIT_DETAIL}(fill (type background))`,
  `${INDENT_UNIT_BODY})`,
  ...unit.overlays.flatMap(renderOverlay),
  ...unit.pins.flatMap(renderPin),
  `${INDENT_PROPERTY})`,
]

const unitPrefixRe = /\(symbol\s+"((?:[^"\\]|\\.)*?)_\d+_\d+"/

/** Static body with its unit sub-symbols renamed after `symbolName`. */
export const renderStaticBody = (symbolName: string, symbolTemplate: string): ReadonlyArray<string> => {
  const prefix = unitPrefixRe.exec(symbolTemplate)?.[1]
  const renamed =
    prefix === undefined
      ? symbolTemplate
      : symbolTemplate.replace(/\(symbol(\s+)"((?:[^"\\]|\\.)*?)_(\d+)_(\d+)"/g, (whole, space: string, name: string, a: string, b: string) =>
          name === prefix ? `(symbol${space}"${escapeQuoted(symbolName)}_${a}_${b}"` : whole,
        )
  return renamed
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => `${INDENT_PROPERTY}${line.trimEnd()}`)
}

const geometryOf = (record: PartRecord, template: Template): GeometryResult | undefined => {
  switch (template.generator) {
    case 'IC_BOX':
      return layoutIcBox(resolveValue(record, PIN_DESCRIPTION_FIELD), template.powerPinNames)
    case 'CONNECTOR':
      return layoutConnector(resolveConnectorShape((name) => resolveValue(record, name)))
    case 'STATIC':
    case 'NONE':
      return undefined
  }
}

/**
 * Renders one part into a self-contained `(symbol ...)` block. The first line carries no
 * indentation; inner lines are indented for their place inside a library file.
 *
 * Throws a `RENDER_FAILED` error for a blank name or an unbalanced result.
 */
export const renderSymbol = (record: PartRecord, template: Template): SymbolBlock => {
  const symbolName = symbolNameOf(record)
  if (symbolName.trim().length === 0) {
    throw makeSymbolEngineError({
      code: 'RENDER_FAILED',
      message: `part ${record.id} has a blank name`,
    })
  }

  const geometry = geometryOf(record, template)
  const positions = geometry ? computedPositions(geometry) : undefined

  const propertyLines = buildProperties(record, template).map(([name, value]) => {
    const propertyTemplate = Object.hasOwn(template.propertyTemplates, name) ? template.propertyTemplates[name] : undefined
    const at = positions?.get(name)
    const line = at
      ? placedProperty(name, value, at[0], at[1], propertyTemplate)
      : renderProperty(name, value, propertyTemplate)
    return `${INDENT_PROPERTY}${line}`
  })

  const body: ReadonlyArray<string> = geometry
    ? geometry.units.flatMap((unit) => renderUnit(symbolName, unit))
    : template.generator === 'STATIC' && template.symbolTemplate !== undefined
      ? renderStaticBody(symbolName, template.symbolTemplate)
      : [
          `${INDENT_PROPERTY}(text "No template found for ${escapeQuoted(symbolName)}" (at 0 0 0) (effects (font ${DEFAULT_FONT})))`,
        ]

  const header = ['(symbol', `"${escapeQuoted(symbolName)}"`, template.symbolOptions, '(in_bom yes) (on_board yes)']
    .filter((part) => part.length > 0)
    .join(' ')

  const text = [header, ...propertyLines, ...body, '  )'].join('\n')

  if (!isBalancedBlock(text)) {
    throw makeSymbolEngineError({
      code: 'RENDER_FAILED',
      message: `symbol "${symbolName}" renders with unbalanced parentheses`,
      hint: `Check the property templates and symbol_template of template "${template.name}".`,
    })
  }

  return { symbolName, text }
}
