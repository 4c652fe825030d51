import React from 'react'

export const DEFAULT_OFFLINE_MESSAGE = 'Map is offline. Check your internet connection.'

export interface OfflineBannerProps {
    backgroundColor?: string
    message?: string
    onRetry?: () => void
    isDismissible?: boolean
    onDismiss?: () => void
}

/**
 * オフライン時に表示するバナー
 * 再試行ボタンと閉じるボタン（任意）を持つ
 */
export const OfflineBanner: React.FC<OfflineBannerProps> = ({
    backgroundColor = 'rgba(244, 67, 54, 0.8)',
    message = DEFAULT_OFFLINE_MESSAGE,
    onRetry,
    isDismissible = false,
    onDismiss
}) => {
    return (
        <div
            role="alert"
            style={{
                display: 'flex',
                alignItems: 'center',
                gap: 12,
                width: '100%',
                padding: 16,
                boxSizing: 'border-box',
                background: backgroundColor,
                color: 'white'
            }}
        >
            <span style={{ flex: 1, fontSize: 14, fontWeight: 500 }}>{message}</span>
            {onRetry && (
                <button type="button" onClick={onRetry} style={{ color: 'white', fontWeight: 'bold', background: 'none', border: 'none' }}>
                    Retry
                </button>
            )}
            {isDismissible && onDismiss && (
                <button type="button" aria-label="Dismiss" onClick={onDismiss} style={{ color: 'white', background: 'none', border: 'none' }}>
                    ×
                </button>
            )}
        </div>
    )
}
