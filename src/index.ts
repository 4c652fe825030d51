// Types
export type {
  ConnectivityState,
  DrawingListener,
  DrawingSessionOptions,
  DrawingState,
  DrawingStatus,
  GeoPoint,
  MapTransform,
  ScreenPoint
} from './types'

// Core
export { DrawingSession, MIN_POINT_DISTANCE, CONNECTIVITY_TIMEOUT } from './session/DrawingSession'
export { createIdleState, getDisplayPath, hasPoints, isDrawing, isIdle } from './session/drawingState'
export {
  EARTH_RADIUS,
  batchScreenToGeo,
  distance,
  isPathInsideLoop,
  pointInPolygon,
  screenToGeo
} from './utils/geometry'
export { createLogger, type DrawingLogger } from './utils/logger'

// Hooks
export { useDrawingSession } from './hooks/useDrawingSession'

// Components
export { DrawingMap, type DrawingMapProps, type DrawingMapRenderProps } from './components/DrawingMap'
export { OfflineBanner, DEFAULT_OFFLINE_MESSAGE, type OfflineBannerProps } from './components/OfflineBanner'
