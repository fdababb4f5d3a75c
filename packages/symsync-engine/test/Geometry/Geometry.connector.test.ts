import { describe, expect, it } from 'vitest'

import { layoutConnector, resolveConnectorShape } from '../../src/Geometry.js'

const params =
  (entries: Record<string, string>) =>
  (name: string): string =>
    entries[name] ?? ''

const sides = (shape: Parameters<typeof layoutConnector>[0]) => {
  const pins = layoutConnector(shape).units[0]?.pins ?? []
  return {
    left: pins.filter((p) => p.orientation === 0).map((p) => p.number),
    right: pins.filter((p) => p.orientation === 180).map((p) => p.number),
  }
}

describe('Geometry.resolveConnectorShape', () => {
  it('reads explicit rows and pins per row', () => {
    expect(resolveConnectorShape(params({ 'Number of Rows': '2', 'Pins per Row': '4' }))).toEqual({
      rows: 2,
      pinsPerRow: 4,
      numbering: 'row',
    })
  })

  it('spreads the total pin count over the rows', () => {
    expect(resolveConnectorShape(params({ 'Number of Rows': '2', 'Number of Pins': '7' })).pinsPerRow).toBe(4)
    expect(resolveConnectorShape(params({ 'Pin Count': '5' }))).toEqual({ rows: 1, pinsPerRow: 5, numbering: 'row' })
  })

  it('clamps missing or non-positive values to one', () => {
    expect(resolveConnectorShape(params({}))).toEqual({ rows: 1, pinsPerRow: 1, numbering: 'row' })
    expect(resolveConnectorShape(params({ 'Number of Rows': '0', 'Pins per Row': '-3' }))).toEqual({
      rows: 1,
      pinsPerRow: 1,
      numbering: 'row',
    })
    expect(resolveConnectorShape(params({ 'Number of Rows': 'two', 'Pins per Row': '3' })).rows).toBe(1)
  })

  it('only honours line numbering for more than one row', () => {
    expect(resolveConnectorShape(params({ 'Pin Annotation': 'Line', 'Number of Rows': '2' })).numbering).toBe('line')
    expect(resolveConnectorShape(params({ 'Pin Annotation': 'line' })).numbering).toBe('row')
  })

  it('reads the gender case-insensitively', () => {
    expect(resolveConnectorShape(params({ Gender: 'Female' })).gender).toBe('female')
    expect(resolveConnectorShape(params({ Gender: 'hermaphrodite' })).gender).toBeUndefined()
  })
})

describe('Geometry.layoutConnector', () => {
  it('numbers 2x4 by row: left column first, then right', () => {
    expect(sides({ rows: 2, pinsPerRow: 4, numbering: 'row' })).toEqual({
      left: ['1', '2', '3', '4'],
      right: ['5', '6', '7', '8'],
    })
  })

  it('numbers 2x4 by line: alternating left and right', () => {
    expect(sides({ rows: 2, pinsPerRow: 4, numbering: 'line' })).toEqual({
      left: ['1', '3', '5', '7'],
      right: ['2', '4', '6', '8'],
    })
  })

  it('uses a single column and a narrow box for one row', () => {
    const unit = layoutConnector({ rows: 1, pinsPerRow: 3, numbering: 'row' }).units[0]
    expect(unit?.pins.map((p) => p.number)).toEqual(['1', '2', '3'])
    expect(unit?.box.left).toBeCloseTo(-1.905)
    expect(unit?.box.top).toBeCloseTo(3.81)
    expect(unit?.pins.every((p) => p.hideName && p.electricalType === 'passive')).toBe(true)
  })

  it('uses the wide box for several rows', () => {
    const unit = layoutConnector({ rows: 2, pinsPerRow: 4, numbering: 'row' }).units[0]
    expect(unit?.box.left).toBeCloseTo(-3.81)
    expect(unit?.box.top).toBeCloseTo(5.08)
  })

  it('draws a stub per pin for male connectors', () => {
    const unit = layoutConnector({ rows: 2, pinsPerRow: 1, numbering: 'row', gender: 'male' }).units[0]
    expect(unit?.overlays).toHaveLength(2)
    const [left, right] = unit?.overlays ?? []
    if (left?.kind !== 'polyline' || right?.kind !== 'polyline') throw new Error('expected polylines')
    expect(left.points[0]?.[0]).toBeCloseTo(-3.81)
    expect(left.points[1]?.[0]).toBeCloseTo(-1.27)
    expect(right.points[0]?.[0]).toBeCloseTo(3.81)
    expect(right.points[1]?.[0]).toBeCloseTo(1.27)
  })

  it('draws a stub and a mirrored arc per pin for female connectors', () => {
    const unit = layoutConnector({ rows: 2, pinsPerRow: 1, numbering: 'row', gender: 'female' }).units[0]
    const kinds = unit?.overlays.map((o) => o.kind)
    expect(kinds).toEqual(['polyline', 'arc', 'polyline', 'arc'])

    const leftArc = unit?.overlays[1]
    const rightArc = unit?.overlays[3]
    if (leftArc?.kind !== 'arc' || rightArc?.kind !== 'arc') throw new Error('expected arcs')
    expect(leftArc.start[1]).toBeCloseTo(0.635)
    expect(leftArc.end[1]).toBeCloseTo(-0.635)
    expect(leftArc.mid[0]).toBeCloseTo(-1.905)
    expect(rightArc.start[1]).toBeCloseTo(-0.635)
    expect(rightArc.end[1]).toBeCloseTo(0.635)
    expect(rightArc.mid[0]).toBeCloseTo(1.905)
  })

  it('draws nothing extra without a gender', () => {
    expect(layoutConnector({ rows: 1, pinsPerRow: 2, numbering: 'row' }).units[0]?.overlays).toEqual([])
  })
})
