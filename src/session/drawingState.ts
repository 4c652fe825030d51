import type { DrawingState, GeoPoint } from '../types'

export const createIdleState = (): DrawingState => ({
  status: 'idle',
  path: [],
  startTime: null,
  isLoopClosed: false
})

export const isDrawing = (state: DrawingState) => state.status === 'drawing'

export const isIdle = (state: DrawingState) => state.status === 'idle'

export const hasPoints = (state: DrawingState) => state.path.length > 0

/**
 * 表示用のパス
 * ループが閉じている場合は始点を末尾に追加する（保存はしない）
 */
export const getDisplayPath = (state: DrawingState): readonly GeoPoint[] => {
  if (state.isLoopClosed && state.path.length > 0) {
    return [...state.path, state.path[0]]
  }
  return state.path
}
