import React, { useEffect, useRef, useState } from 'react'
import { useDrawingSession } from '../hooks/useDrawingSession'
import type { DrawingSessionOptions, DrawingState, GeoPoint, MapTransform, ScreenPoint } from '../types'
import { OfflineBanner, type OfflineBannerProps } from './OfflineBanner'

/**
 * renderMap に渡す値
 * ホスト側の地図はこれを使ってパスを線として描画する
 */
export interface DrawingMapRenderProps {
    /** 地図の描画面が準備できたら呼ぶ */
    onMapReady: () => void
    /** 表示用のパス（閉じている場合は始点を末尾に追加済み） */
    displayPath: readonly GeoPoint[]
    isLoopClosed: boolean
    state: DrawingState
}

export interface DrawingMapProps {
    transform: MapTransform | null | undefined
    renderMap: (props: DrawingMapRenderProps) => React.ReactNode
    options?: DrawingSessionOptions
    className?: string
    style?: React.CSSProperties
    showClearButton?: boolean
    offlineBanner?: Pick<OfflineBannerProps, 'backgroundColor' | 'message' | 'isDismissible'>

    // イベント
    onLoopComplete?: (path: readonly GeoPoint[]) => void
    onStateChange?: (state: DrawingState) => void
}

export const DrawingMap: React.FC<DrawingMapProps> = ({
    transform,
    renderMap,
    options,
    className,
    style,
    showClearButton = true,
    offlineBanner,
    onLoopComplete,
    onStateChange
}) => {
    const overlayRef = useRef<HTMLDivElement>(null)
    const [bannerDismissed, setBannerDismissed] = useState(false)

    const {
        state,
        connectivity,
        displayPath,
        panStart,
        panUpdate,
        panEnd,
        clearLoop,
        setMapReady,
        retryConnection
    } = useDrawingSession(transform, options)

    const isOffline = connectivity.offline
    const isLoading = !connectivity.ready && !connectivity.offline

    // コールバックのref（effect内で最新を参照）
    const onLoopCompleteRef = useRef(onLoopComplete)
    const onStateChangeRef = useRef(onStateChange)
    useEffect(() => {
        onLoopCompleteRef.current = onLoopComplete
        onStateChangeRef.current = onStateChange
    }, [onLoopComplete, onStateChange])

    const prevStatusRef = useRef(state.status)
    useEffect(() => {
        onStateChangeRef.current?.(state)
        if (state.status === 'completed' && prevStatusRef.current !== 'completed') {
            onLoopCompleteRef.current?.(state.path)
        }
        prevStatusRef.current = state.status
    }, [state])

    // コンテナ座標変換ヘルパー
    const toContainerPoint = (clientX: number, clientY: number): ScreenPoint | null => {
        const overlay = overlayRef.current
        if (!overlay) return null

        const rect = overlay.getBoundingClientRect()
        return {
            x: clientX - rect.left,
            y: clientY - rect.top
        }
    }

    // 統合ハンドラ: マウス
    const handleMouseDown = (e: React.MouseEvent) => {
        if (isOffline) return
        const point = toContainerPoint(e.clientX, e.clientY)
        if (point) panStart(point)
    }

    const handleMouseMove = (e: React.MouseEvent) => {
        if (isOffline) return
        const point = toContainerPoint(e.clientX, e.clientY)
        if (point) panUpdate(point)
    }

    const handleMouseUp = () => {
        if (isOffline) return
        panEnd()
    }

    // 統合ハンドラ: タッチ（1本指のみ）
    const handleTouchStart = (e: React.TouchEvent) => {
        if (isOffline || e.touches.length !== 1) return
        const touch = e.touches[0]
        const point = toContainerPoint(touch.clientX, touch.clientY)
        if (point) panStart(point)
    }

    const handleTouchMove = (e: React.TouchEvent) => {
        if (isOffline || e.touches.length !== 1) return
        const touch = e.touches[0]
        const point = toContainerPoint(touch.clientX, touch.clientY)
        if (point) panUpdate(point)
    }

    const handleTouchEnd = () => {
        if (isOffline) return
        panEnd()
    }

    const handleRetry = () => {
        setBannerDismissed(false)
        retryConnection()
    }

    return (
        <div className={className} style={{ position: 'relative', display: 'flex', flexDirection: 'column', ...style }}>
            {isOffline && !bannerDismissed && (
                <OfflineBanner
                    backgroundColor={offlineBanner?.backgroundColor}
                    message={offlineBanner?.message}
                    isDismissible={offlineBanner?.isDismissible ?? true}
                    onRetry={handleRetry}
                    onDismiss={() => setBannerDismissed(true)}
                />
            )}
            <div style={{ position: 'relative', flex: 1 }}>
                {renderMap({
                    onMapReady: setMapReady,
                    displayPath,
                    isLoopClosed: state.isLoopClosed,
                    state
                })}
                {/* オフライン時はジェスチャーを受け付けない（地図をそのまま表示） */}
                {!isOffline && (
                    <div
                        ref={overlayRef}
                        data-testid="drawing-overlay"
                        style={{ position: 'absolute', inset: 0, touchAction: 'none' }}
                        onMouseDown={handleMouseDown}
                        onMouseMove={handleMouseMove}
                        onMouseUp={handleMouseUp}
                        onMouseLeave={handleMouseUp}
                        onTouchStart={handleTouchStart}
                        onTouchMove={handleTouchMove}
                        onTouchEnd={handleTouchEnd}
                    />
                )}
                {isLoading && (
                    <div
                        role="progressbar"
                        aria-label="Connecting to map"
                        style={{ position: 'absolute', inset: 0, background: 'rgba(33, 150, 243, 0.3)', pointerEvents: 'none' }}
                    />
                )}
            </div>
            {showClearButton && !isOffline && (
                <button
                    type="button"
                    title="Clean the loop"
                    onClick={clearLoop}
                    style={{ position: 'absolute', right: 16, bottom: 16 }}
                >
                    Clean the loop
                </button>
            )}
        </div>
    )
}
