import { describe, expect, it } from 'vitest'
import type { GeoPoint, MapTransform } from '../../types'
import {
  EARTH_RADIUS,
  batchScreenToGeo,
  distance,
  isPathInsideLoop,
  pointInPolygon,
  screenToGeo
} from '../geometry'

const pt = (lat: number, lng: number): GeoPoint => ({ lat, lng })

const square = [pt(0, 0), pt(0, 2), pt(2, 2), pt(2, 0)]

// 100px = 1度
const linearTransform: MapTransform = {
  screenToGeo: ({ x, y }) => ({ lat: y / 100, lng: x / 100 })
}

describe('screenToGeo', () => {
  it('delegates to the host transform', () => {
    expect(screenToGeo({ x: 50, y: 200 }, linearTransform)).toEqual({ lat: 2, lng: 0.5 })
  })

  it('returns undefined when no transform is available', () => {
    expect(screenToGeo({ x: 1, y: 1 }, null)).toBeUndefined()
    expect(screenToGeo({ x: 1, y: 1 }, undefined)).toBeUndefined()
  })

  it('returns undefined instead of throwing when the transform fails', () => {
    const failing: MapTransform = {
      screenToGeo: () => {
        throw new Error('camera not ready')
      }
    }
    expect(screenToGeo({ x: 1, y: 1 }, failing)).toBeUndefined()
  })

  it('rejects non-finite coordinates', () => {
    const broken: MapTransform = { screenToGeo: () => ({ lat: Number.NaN, lng: 0 }) }
    expect(screenToGeo({ x: 1, y: 1 }, broken)).toBeUndefined()
  })
})

describe('batchScreenToGeo', () => {
  it('keeps order and drops failed conversions', () => {
    const partial: MapTransform = {
      screenToGeo: ({ x, y }) => {
        if (x < 0) throw new Error('off map')
        return { lat: y / 100, lng: x / 100 }
      }
    }
    const result = batchScreenToGeo(
      [
        { x: 100, y: 0 },
        { x: -1, y: 0 },
        { x: 0, y: 300 }
      ],
      partial
    )
    expect(result).toEqual([pt(0, 1), pt(3, 0)])
  })

  it('returns an empty list when the transform is missing', () => {
    expect(batchScreenToGeo([{ x: 0, y: 0 }], null)).toEqual([])
  })
})

describe('distance', () => {
  it('is zero for identical points', () => {
    expect(distance(pt(0, 0), pt(0, 0))).toBe(0)
  })

  it('measures one degree of latitude along a meridian', () => {
    expect(distance(pt(0, 0), pt(1, 0))).toBeCloseTo((EARTH_RADIUS * Math.PI) / 180, 6)
  })

  it('is symmetric', () => {
    const a = pt(51.5, -0.1)
    const b = pt(51.6, -0.2)
    expect(distance(a, b)).toBeCloseTo(distance(b, a), 9)
  })

  it('gives half the circumference for antipodal points', () => {
    expect(distance(pt(0, 0), pt(0, 180))).toBeCloseTo(Math.PI * EARTH_RADIUS, 3)
  })
})

describe('pointInPolygon', () => {
  it('detects points inside and outside a square', () => {
    expect(pointInPolygon(pt(1, 1), square)).toBe(true)
    expect(pointInPolygon(pt(3, 3), square)).toBe(false)
  })

  it('returns false for polygons with fewer than 3 vertices', () => {
    expect(pointInPolygon(pt(0, 0), [])).toBe(false)
    expect(pointInPolygon(pt(0, 0), [pt(0, 0)])).toBe(false)
    expect(pointInPolygon(pt(0.5, 0.5), [pt(0, 0), pt(1, 1)])).toBe(false)
  })

  it('handles a concave polygon', () => {
    // L字型
    const lShape = [pt(0, 0), pt(0, 4), pt(1, 4), pt(1, 1), pt(4, 1), pt(4, 0)]
    expect(pointInPolygon(pt(0.5, 3), lShape)).toBe(true)
    expect(pointInPolygon(pt(3, 0.5), lShape)).toBe(true)
    expect(pointInPolygon(pt(3, 3), lShape)).toBe(false)
  })

  it('does not depend on the winding direction', () => {
    const reversed = [...square].reverse()
    expect(pointInPolygon(pt(1, 1), reversed)).toBe(true)
    expect(pointInPolygon(pt(-1, 1), reversed)).toBe(false)
  })
})

describe('isPathInsideLoop', () => {
  const path = [pt(0.5, 0.5), pt(1, 1), pt(5, 5)]

  it('uses the share of points inside the loop', () => {
    expect(isPathInsideLoop(path, square)).toBe(true)
    expect(isPathInsideLoop(path, square, 0.9)).toBe(false)
  })

  it('returns false for an empty path', () => {
    expect(isPathInsideLoop([], square)).toBe(false)
  })
})
