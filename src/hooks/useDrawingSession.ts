// useDrawingSession.ts
import { useCallback, useEffect, useRef, useState, useSyncExternalStore } from 'react'
import { DrawingSession } from '../session/DrawingSession'
import { createIdleState, getDisplayPath } from '../session/drawingState'
import type { ConnectivityState, DrawingSessionOptions, MapTransform, ScreenPoint } from '../types'
import { screenToGeo } from '../utils/geometry'
import { createLogger } from '../utils/logger'

// マウント前のスナップショット（参照を固定する）
const IDLE_STATE = createIdleState()
const INITIAL_CONNECTIVITY: ConnectivityState = { ready: false, offline: false }

const noopSubscribe = () => () => {}

export const useDrawingSession = (
  transform: MapTransform | null | undefined,
  options: DrawingSessionOptions = {}
) => {
  // セッションはマウント時に作成し、アンマウント時に破棄する
  // StrictModeの再マウントでは新しいセッションに置き換わる
  const [session, setSession] = useState<DrawingSession | null>(null)
  const [logger] = useState(() => createLogger(options.debug ?? false))

  // optionsは作成時のみ反映
  const optionsRef = useRef(options)

  // transformのref（ハンドラ内で最新を参照）
  const transformRef = useRef(transform)
  useEffect(() => {
    transformRef.current = transform
  }, [transform])

  useEffect(() => {
    const created = new DrawingSession(optionsRef.current)
    setSession(created)
    return () => {
      created.dispose()
    }
  }, [])

  const subscribe = useCallback(
    (listener: () => void) => (session ? session.subscribe(listener) : noopSubscribe()),
    [session]
  )
  const state = useSyncExternalStore(subscribe, () => session?.getState() ?? IDLE_STATE)
  const connectivity = useSyncExternalStore(subscribe, () => session?.getConnectivity() ?? INITIAL_CONNECTIVITY)

  const toGeo = (point: ScreenPoint) => {
    const geo = screenToGeo(point, transformRef.current)
    if (!geo) {
      logger.warn('screen point could not be converted', { x: point.x, y: point.y })
    }
    return geo
  }

  /**
   * ポインターダウン時に呼ぶ
   */
  const panStart = (point: ScreenPoint) => {
    if (!session) return
    const geo = toGeo(point)
    if (!geo) return
    session.start(geo)
  }

  /**
   * ポインター移動時に呼ぶ
   */
  const panUpdate = (point: ScreenPoint) => {
    if (!session || session.getState().status !== 'drawing') return
    const geo = toGeo(point)
    if (!geo) return
    session.addPoint(geo)
  }

  /**
   * ポインターアップ時に呼ぶ
   */
  const panEnd = () => {
    if (!session || session.getState().status !== 'drawing') return
    session.complete()
  }

  return {
    session,
    state,
    connectivity,
    displayPath: getDisplayPath(state),
    panStart,
    panUpdate,
    panEnd,
    reset: () => session?.reset(),
    clearLoop: () => session?.clearLoop(),
    setMapReady: () => session?.setMapReady(),
    retryConnection: () => session?.retryConnection()
  }
}
