export const GRID = 2.54
export const PIN_LENGTH = 2.54
export const IC_BOX_WIDTH = 15.24
export const CONNECTOR_WIDTH_SINGLE = 3.81
export const CONNECTOR_WIDTH_MULTI = 7.62

export const MIN_GRID_MAIN_UNIT = 3
export const MIN_GRID_POWER_UNIT = 2
export const MIN_GRID_CONNECTOR = 2

export type PinElectricalType = 'power_in' | 'passive'

export type PinSpec = {
  readonly index: number
  readonly name: string
}

export type PlacedPin = {
  readonly number: string
  readonly name: string
  readonly electricalType: PinElectricalType
  readonly x: number
  readonly y: number
  readonly orientation: 0 | 180
  readonly hideName: boolean
}

export type Box = {
  readonly top: number
  readonly bottom: number
  readonly left: number
  readonly right: number
}

export type Point = readonly [x: number, y: number]

export type Overlay =
  | { readonly kind: 'polyline'; readonly points: ReadonlyArray<Point> }
  | { readonly kind: 'arc'; readonly start: Point; readonly mid: Point; readonly end: Point }

export type SymbolUnit = {
  readonly unit: number
  readonly box: Box
  readonly pins: ReadonlyArray<PlacedPin>
  readonly overlays: ReadonlyArray<Overlay>
}

export type GeometryResult = {
  readonly kind: 'IC_BOX' | 'CONNECTOR'
  readonly units: ReadonlyArray<SymbolUnit>
}

export type ConnectorNumbering = 'row' | 'line'

export type ConnectorShape = {
  readonly rows: number
  readonly pinsPerRow: number
  readonly numbering: ConnectorNumbering
  readonly gender?: 'male' | 'female'
}

type SidePin = {
  readonly number: string
  readonly name: string
  readonly electricalType: PinElectricalType
  readonly hideName: boolean
}

export const parsePinList = (pinDescription: string): ReadonlyArray<PinSpec> =>
  pinDescription
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((name, i) => ({ index: i + 1, name }))

export const partitionPins = (
  pins: ReadonlyArray<PinSpec>,
  powerPinNames: ReadonlyArray<string>,
): { readonly main: ReadonlyArray<PinSpec>; readonly power: ReadonlyArray<PinSpec> } => {
  const powerSet = new Set(powerPinNames.map((n) => n.toLowerCase()))
  const main: PinSpec[] = []
  const power: PinSpec[] = []
  for (const pin of pins) {
    if (powerSet.has(pin.name.toLowerCase())) power.push(pin)
    else main.push(pin)
  }
  return { main, power }
}

/** Box height for the larger side's pin count; zero pins still get `minGrid` grids. */
export const boxHeight = (maxSideCount: number, minGrid: number): number => {
  const grids = Math.max(minGrid, maxSideCount > 0 ? maxSideCount - 1 : 0)
  return grids * GRID + GRID
}

const makeBox = (width: number, maxSideCount: number, minGrid: number): Box => {
  const top = boxHeight(maxSideCount, minGrid) / 2
  const left = -width / 2
  return { top, bottom: -top, left, right: -left }
}

const placeSide = (pins: ReadonlyArray<SidePin>, x: number, orientation: 0 | 180): ReadonlyArray<PlacedPin> => {
  const startY = ((pins.length - 1) * GRID) / 2
  return pins.map((pin, i) => ({ ...pin, x, y: startY - i * GRID, orientation }))
}

const splitSides = <A>(items: ReadonlyArray<A>): { readonly left: ReadonlyArray<A>; readonly right: ReadonlyArray<A> } => {
  const leftCount = Math.ceil(items.length / 2)
  return { left: items.slice(0, leftCount), right: items.slice(leftCount) }
}

const icUnit = (
  unit: number,
  pins: ReadonlyArray<PinSpec>,
  powerSet: ReadonlySet<string>,
  minGrid: number,
): SymbolUnit => {
  const sidePins = pins.map(
    (pin): SidePin => ({
      number: String(pin.index),
      name: pin.name,
      electricalType: powerSet.has(pin.name.toLowerCase()) ? 'power_in' : 'passive',
      hideName: false,
    }),
  )
  const { left, right } = splitSides(sidePins)
  const box = makeBox(IC_BOX_WIDTH, Math.max(left.length, right.length), minGrid)
  const pinX = box.right + PIN_LENGTH
  return {
    unit,
    box,
    pins: [...placeSide(left, -pinX, 0), ...placeSide(right, pinX, 180)],
    overlays: [],
  }
}

/**
 * IC box layout. Power pins get their own unit only when main pins exist too; otherwise every
 * pin lands in unit 1.
 */
export const layoutIcBox = (pinDescription: string, powerPinNames: ReadonlyArray<string>): GeometryResult => {
  const pins = parsePinList(pinDescription)
  const { main, power } = partitionPins(pins, powerPinNames)
  const powerSet = new Set(powerPinNames.map((n) => n.toLowerCase()))

  if (main.length > 0 && power.length > 0) {
    return {
      kind: 'IC_BOX',
      units: [icUnit(1, main, powerSet, MIN_GRID_MAIN_UNIT), icUnit(2, power, powerSet, MIN_GRID_POWER_UNIT)],
    }
  }
  return { kind: 'IC_BOX', units: [icUnit(1, pins, powerSet, MIN_GRID_MAIN_UNIT)] }
}

const parseIntStrict = (raw: string | undefined): number | undefined => {
  if (raw === undefined) return undefined
  const trimmed = raw.trim()
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined
  return Number.parseInt(trimmed, 10)
}

/**
 * Rows and pins per row from connector parameters. Pins per row falls back to the total pin
 * count spread over the rows; both values clamp to at least 1.
 */
export const resolveConnectorShape = (param: (name: string) => string): ConnectorShape => {
  const rowsRaw = param('Number of Rows')
  const rows = rowsRaw.trim().length > 0 ? (parseIntStrict(rowsRaw) ?? 1) : 1

  let pinsPerRow = parseIntStrict(param('Pins per Row')) ?? 0
  if (pinsPerRow <= 0) {
    const totalRaw = param('Number of Pins') || param('Pin Count')
    const total = parseIntStrict(totalRaw) ?? 0
    if (total > 0 && rows > 0) pinsPerRow = Math.ceil(total / rows)
  }

  const clampedRows = Math.max(1, rows)
  const annotation = param('Pin Annotation').trim().toLowerCase()
  const gender = param('Gender').trim().toLowerCase()

  return {
    rows: clampedRows,
    pinsPerRow: Math.max(1, pinsPerRow),
    numbering: annotation === 'line' && clampedRows > 1 ? 'line' : 'row',
    ...(gender === 'male' || gender === 'female' ? { gender } : null),
  }
}

const genderOverlays = (
  gender: ConnectorShape['gender'],
  edgeX: number,
  y: number,
  side: 'left' | 'right',
): ReadonlyArray<Overlay> => {
  const dir = side === 'left' ? 1 : -1
  if (gender === 'male') {
    return [{ kind: 'polyline', points: [[edgeX, y], [edgeX + dir * 2.54, y]] }]
  }
  if (gender === 'female') {
    const arcStartY = side === 'left' ? y + 0.635 : y - 0.635
    const arcEndY = side === 'left' ? y - 0.635 : y + 0.635
    return [
      { kind: 'polyline', points: [[edgeX, y], [edgeX + dir * 1.905, y]] },
      {
        kind: 'arc',
        start: [edgeX + dir * 2.54, arcStartY],
        mid: [edgeX + dir * 1.905, y],
        end: [edgeX + dir * 2.54, arcEndY],
      },
    ]
  }
  return []
}

/**
 * Connector layout: one column for a single row, two columns otherwise.
 * `row` numbering runs down the left column then the right one; `line` alternates left/right.
 */
export const layoutConnector = (shape: ConnectorShape): GeometryResult => {
  const perColumn = shape.pinsPerRow
  const twoColumns = shape.rows > 1
  const width = twoColumns ? CONNECTOR_WIDTH_MULTI : CONNECTOR_WIDTH_SINGLE
  const box = makeBox(width, perColumn, MIN_GRID_CONNECTOR)

  const numberOf = (side: 'left' | 'right', i: number): number => {
    if (shape.numbering === 'line') return side === 'left' ? 2 * i + 1 : 2 * i + 2
    return side === 'left' ? i + 1 : perColumn + i + 1
  }

  const column = (side: 'left' | 'right'): ReadonlyArray<SidePin> =>
    Array.from({ length: perColumn }, (_, i): SidePin => {
      const number = String(numberOf(side, i))
      return { number, name: number, electricalType: 'passive', hideName: true }
    })

  const pinX = box.right + PIN_LENGTH
  const left = placeSide(column('left'), -pinX, 0)
  const right = twoColumns ? placeSide(column('right'), pinX, 180) : []

  const overlays = [
    ...left.flatMap((pin) => genderOverlays(shape.gender, box.left, pin.y, 'left')),
    ...right.flatMap((pin) => genderOverlays(shape.gender, box.right, pin.y, 'right')),
  ]

  return { kind: 'CONNECTOR', units: [{ unit: 1, box, pins: [...left, ...right], overlays }] }
}
