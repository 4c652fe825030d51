import type { GeoPoint, MapTransform, ScreenPoint } from '../types'

/** 地図ライブラリの距離計算と合わせた地球半径（メートル） */
export const EARTH_RADIUS = 6378137

const toRadians = (deg: number) => (deg * Math.PI) / 180

/**
 * 画面座標を地理座標に変換
 * 変換できない場合は undefined（例外は外に出さない）
 */
export const screenToGeo = (
  screenPoint: ScreenPoint,
  transform: MapTransform | null | undefined
): GeoPoint | undefined => {
  if (!transform) return undefined

  try {
    const geo = transform.screenToGeo(screenPoint)
    if (!Number.isFinite(geo.lat) || !Number.isFinite(geo.lng)) return undefined
    return { lat: geo.lat, lng: geo.lng }
  } catch {
    return undefined
  }
}

/**
 * 複数の画面座標をまとめて変換（失敗した点は除外、順序は維持）
 */
export const batchScreenToGeo = (
  screenPoints: readonly ScreenPoint[],
  transform: MapTransform | null | undefined
): GeoPoint[] => {
  const result: GeoPoint[] = []
  for (const point of screenPoints) {
    const geo = screenToGeo(point, transform)
    if (geo) result.push(geo)
  }
  return result
}

/**
 * 2点間の大圏距離（メートル、ハーバサイン公式）
 */
export const distance = (a: GeoPoint, b: GeoPoint): number => {
  const dLat = toRadians(b.lat - a.lat)
  const dLng = toRadians(b.lng - a.lng)
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLng / 2) ** 2
  return 2 * EARTH_RADIUS * Math.asin(Math.min(1, Math.sqrt(h)))
}

/**
 * 点がポリゴン内にあるかどうかを判定（Ray Casting Algorithm）
 * 東向きの水平レイとの交差数が奇数なら内側。
 * 辺・頂点ちょうどの点の結果は不定。
 */
export const pointInPolygon = (point: GeoPoint, polygon: readonly GeoPoint[]): boolean => {
  if (polygon.length < 3) return false

  let intersections = 0
  for (let i = 0; i < polygon.length; i++) {
    const start = polygon[i]
    const end = polygon[(i + 1) % polygon.length]

    if ((start.lat > point.lat) === (end.lat > point.lat)) continue

    const intersectionLng =
      ((end.lng - start.lng) * (point.lat - start.lat)) / (end.lat - start.lat) + start.lng
    if (point.lng < intersectionLng) {
      intersections++
    }
  }

  return intersections % 2 === 1
}

/**
 * パスがループ内に含まれているかを判定
 * ratio 以上の割合の点がループ内にあれば true
 */
export const isPathInsideLoop = (
  path: readonly GeoPoint[],
  loop: readonly GeoPoint[],
  ratio: number = 0.5
): boolean => {
  if (path.length === 0) return false

  let insideCount = 0
  for (const point of path) {
    if (pointInPolygon(point, loop)) {
      insideCount++
    }
  }

  return insideCount / path.length >= ratio
}
