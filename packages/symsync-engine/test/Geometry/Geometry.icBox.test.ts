import { describe, expect, it } from 'vitest'

import { boxHeight, GRID, layoutIcBox, parsePinList, partitionPins } from '../../src/Geometry.js'

describe('Geometry.layoutIcBox', () => {
  it('splits LM358 into a main unit and a power unit', () => {
    const g = layoutIcBox('IN+,IN-,VCC,OUT,GND', ['VCC', 'GND'])
    expect(g.units).toHaveLength(2)

    const [a, b] = g.units
    expect(a?.unit).toBe(1)
    expect(a?.pins.map((p) => p.name)).toEqual(['IN+', 'IN-', 'OUT'])
    expect(a?.pins.map((p) => p.number)).toEqual(['1', '2', '4'])
    expect(b?.unit).toBe(2)
    expect(b?.pins.map((p) => p.name)).toEqual(['VCC', 'GND'])
    expect(b?.pins.map((p) => p.electricalType)).toEqual(['power_in', 'power_in'])
  })

  it('places pins left then right, one grid apart, centered', () => {
    const g = layoutIcBox('IN+,IN-,VCC,OUT,GND', ['VCC', 'GND'])
    const a = g.units[0]
    if (!a) throw new Error('expected unit 1')

    expect(a.box.top).toBeCloseTo(5.08)
    expect(a.box.bottom).toBeCloseTo(-5.08)
    expect(a.box.left).toBeCloseTo(-7.62)
    expect(a.box.right).toBeCloseTo(7.62)

    const [inPlus, inMinus, out] = a.pins
    expect(inPlus?.x).toBeCloseTo(-10.16)
    expect(inPlus?.y).toBeCloseTo(1.27)
    expect(inPlus?.orientation).toBe(0)
    expect(inMinus?.y).toBeCloseTo(-1.27)
    expect(out?.x).toBeCloseTo(10.16)
    expect(out?.y).toBeCloseTo(0)
    expect(out?.orientation).toBe(180)
    expect(out?.electricalType).toBe('passive')

    const b = g.units[1]
    expect(b?.box.top).toBeCloseTo(3.81)
  })

  it('keeps every pin in unit 1 when one group is empty', () => {
    expect(layoutIcBox('A,B,C', ['VCC']).units).toHaveLength(1)

    const powerOnly = layoutIcBox('VCC,GND', ['vcc', 'gnd'])
    expect(powerOnly.units).toHaveLength(1)
    expect(powerOnly.units[0]?.pins.map((p) => p.electricalType)).toEqual(['power_in', 'power_in'])
  })

  it('still draws a minimum box without pins', () => {
    const g = layoutIcBox('', [])
    expect(g.units).toHaveLength(1)
    expect(g.units[0]?.pins).toEqual([])
    expect(g.units[0]?.box.top).toBeCloseTo((3 * GRID + GRID) / 2)
  })

  it('is deterministic', () => {
    expect(layoutIcBox('A,VCC,B,GND,C', ['VCC', 'GND'])).toEqual(layoutIcBox('A,VCC,B,GND,C', ['VCC', 'GND']))
  })
})

describe('Geometry.partitionPins', () => {
  it('covers the input list and keeps relative order in each group', () => {
    const pins = parsePinList(' A , VCC,B,,GND, C ,vcc')
    expect(pins.map((p) => p.name)).toEqual(['A', 'VCC', 'B', 'GND', 'C', 'vcc'])
    expect(pins.map((p) => p.index)).toEqual([1, 2, 3, 4, 5, 6])

    const { main, power } = partitionPins(pins, ['VCC', 'GND'])
    expect(main.map((p) => p.name)).toEqual(['A', 'B', 'C'])
    expect(power.map((p) => p.name)).toEqual(['VCC', 'GND', 'vcc'])
    expect(new Set([...main, ...power].map((p) => p.index))).toEqual(new Set(pins.map((p) => p.index)))
  })
})

describe('Geometry.boxHeight', () => {
  it('never shrinks as the larger side grows', () => {
    for (const minGrid of [2, 3]) {
      let previous = 0
      for (let n = 0; n <= 24; n++) {
        const h = boxHeight(n, minGrid)
        expect(h).toBeGreaterThanOrEqual(previous)
        previous = h
      }
    }
  })

  it('grows with the pin count through layoutIcBox', () => {
    let previous = 0
    for (let n = 0; n <= 16; n++) {
      const names = Array.from({ length: n }, (_, i) => `P${i + 1}`).join(',')
      const top = layoutIcBox(names, []).units[0]?.box.top ?? 0
      expect(top).toBeGreaterThanOrEqual(previous)
      previous = top
    }
  })
})
