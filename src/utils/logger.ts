export interface DrawingLogger {
  debug: (label: string, details?: Record<string, unknown>) => void
  warn: (label: string, details?: Record<string, unknown>) => void
}

const noop = () => {}

/**
 * debugが有効な場合のみコンソールへ出力するロガー
 */
export const createLogger = (enabled: boolean): DrawingLogger => {
  if (!enabled) {
    return { debug: noop, warn: noop }
  }

  return {
    debug: (label, details) => {
      if (details) {
        console.log(`🗺️ ${label}`, details)
      } else {
        console.log(`🗺️ ${label}`)
      }
    },
    warn: (label, details) => {
      console.warn(`⚠️ ${label}`, details ?? {})
    }
  }
}
