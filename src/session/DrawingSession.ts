/**
 * 地図上でループを描くための描画セッション
 *
 * 指のドラッグで点を追加し、指を離すとループを閉じる。
 *
 * 仕様:
 * - idle → drawing → completed、reset でいつでも idle に戻る
 * - 状態に合わない呼び出しは何もしない（エラーにしない）
 * - 直前の点から minPointDistance 未満の点は捨てる
 * - 地図の準備完了が connectivityTimeout 内に来なければオフライン扱い
 */
import type {
  ConnectivityState,
  DrawingListener,
  DrawingSessionOptions,
  DrawingState,
  GeoPoint
} from '../types'
import { distance } from '../utils/geometry'
import { createLogger, type DrawingLogger } from '../utils/logger'
import { createIdleState } from './drawingState'

/** 連続する点の最小間隔（メートル） */
export const MIN_POINT_DISTANCE = 1000

/** オフライン判定までの時間（ミリ秒） */
export const CONNECTIVITY_TIMEOUT = 10000

const validOr = (value: number | undefined, fallback: number) =>
  value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback

export class DrawingSession {
  private state: DrawingState = createIdleState()
  private connectivity: ConnectivityState = { ready: false, offline: false }
  // ドラッグで点が追加されたか（タップとドラッグの区別用）
  private dragging = false
  private timer: ReturnType<typeof setTimeout> | null = null
  private listeners: DrawingListener[] = []
  private disposed = false

  private readonly minPointDistance: number
  private readonly connectivityTimeout: number
  private readonly now: () => number
  private readonly logger: DrawingLogger

  constructor(options: DrawingSessionOptions = {}) {
    this.minPointDistance = validOr(options.minPointDistance, MIN_POINT_DISTANCE)
    this.connectivityTimeout = validOr(options.connectivityTimeout, CONNECTIVITY_TIMEOUT)
    this.now = options.now ?? Date.now
    this.logger = createLogger(options.debug ?? false)

    this.armConnectivityTimer()
  }

  getState(): DrawingState {
    return this.state
  }

  getConnectivity(): ConnectivityState {
    return this.connectivity
  }

  isDragging(): boolean {
    return this.dragging
  }

  /**
   * 変更通知の購読
   * @returns 購読解除関数
   */
  subscribe(listener: DrawingListener): () => void {
    if (this.disposed) return () => {}
    this.listeners = [...this.listeners, listener]
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener)
    }
  }

  /**
   * 描画開始（どの状態からでも新しいセッションを始める）
   */
  start(point: GeoPoint) {
    this.dragging = false
    this.commit({
      status: 'drawing',
      path: [{ lat: point.lat, lng: point.lng }],
      startTime: this.now(),
      isLoopClosed: false
    })
  }

  /**
   * 点を追加（描画中のみ）
   */
  addPoint(point: GeoPoint) {
    if (this.state.status !== 'drawing') return

    const path = this.state.path
    if (path.length > 0) {
      const last = path[path.length - 1]
      const d = distance(last, point)
      if (d < this.minPointDistance) {
        this.logger.debug('point dropped', { distance: d, minPointDistance: this.minPointDistance })
        return
      }
    }

    this.dragging = true
    this.commit({ ...this.state, path: [...path, { lat: point.lat, lng: point.lng }] })
  }

  /**
   * 描画完了（ループを閉じる）
   * - タップ（点が追加されていない）: 点があれば閉じる、なければリセット
   * - ドラッグ: 常に閉じる
   */
  complete() {
    if (this.state.status !== 'drawing') return

    if (!this.dragging && this.state.path.length === 0) {
      // start() が必ず1点入れるので通常は到達しない
      this.reset()
      return
    }

    this.commit({ ...this.state, status: 'completed', isLoopClosed: true })
  }

  reset() {
    this.dragging = false
    this.commit(createIdleState())
  }

  /**
   * 「ループを消す」ボタン用
   */
  clearLoop() {
    this.reset()
  }

  /**
   * 地図の準備完了（オンライン）
   */
  setMapReady() {
    if (this.disposed) return
    this.cancelConnectivityTimer()
    this.connectivity = { ready: true, offline: false }
    this.logger.debug('map ready')
    this.notify()
  }

  /**
   * 接続の再試行（オフライン表示を消してタイマーを再始動）
   */
  retryConnection() {
    if (this.disposed) return
    this.connectivity = { ...this.connectivity, offline: false }
    this.armConnectivityTimer()
    this.logger.debug('retry connection', { timeout: this.connectivityTimeout })
    this.notify()
  }

  /**
   * 破棄（タイマーを止め、購読を全て解除）
   */
  dispose() {
    this.cancelConnectivityTimer()
    this.listeners = []
    this.disposed = true
  }

  private commit(next: DrawingState) {
    const prevStatus = this.state.status
    this.state = next
    if (prevStatus !== next.status) {
      this.logger.debug(`${prevStatus} → ${next.status}`, { points: next.path.length })
    }
    this.notify()
  }

  private notify() {
    for (const listener of this.listeners) {
      listener()
    }
  }

  private armConnectivityTimer() {
    this.cancelConnectivityTimer()
    this.timer = setTimeout(() => {
      this.timer = null
      this.onConnectivityTimeout()
    }, this.connectivityTimeout)
  }

  private cancelConnectivityTimer() {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }

  private onConnectivityTimeout() {
    if (this.connectivity.ready) return
    this.connectivity = { ready: false, offline: true }
    this.logger.warn('map not ready, switching to offline mode', { timeout: this.connectivityTimeout })
    this.notify()
  }
}
