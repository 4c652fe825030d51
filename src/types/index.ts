/**
 * 描画セッションの状態
 */
export type DrawingStatus = 'idle' | 'drawing' | 'completed'

/**
 * 地図上の座標（緯度・経度）
 */
export interface GeoPoint {
  lat: number
  lng: number
}

/**
 * 地図コンテナ内のピクセル座標
 */
export interface ScreenPoint {
  x: number
  y: number
}

/**
 * 描画状態（変更のたびに丸ごと置き換える）
 */
export interface DrawingState {
  readonly status: DrawingStatus
  readonly path: readonly GeoPoint[]
  /** 描画開始時刻（エポックミリ秒）、idle中はnull */
  readonly startTime: number | null
  readonly isLoopClosed: boolean
}

/**
 * 地図の接続状態
 * 初回の検出期間中のみ両方falseになりうる
 */
export interface ConnectivityState {
  readonly ready: boolean
  readonly offline: boolean
}

/**
 * ホスト側の地図ライブラリが提供する座標変換
 */
export interface MapTransform {
  /** 変換できない場合は例外を投げてよい */
  screenToGeo(point: ScreenPoint): GeoPoint
}

/**
 * 描画セッションの設定
 */
export interface DrawingSessionOptions {
  /** 連続する点の最小間隔（メートル） */
  minPointDistance?: number
  /** オフライン判定までの時間（ミリ秒） */
  connectivityTimeout?: number
  now?: () => number
  /** コンソールに診断ログを出す */
  debug?: boolean
}

export type DrawingListener = () => void
