export type StatusLogger = {
  debug: (message: string, payload?: Record<string, unknown>) => void
  warn: (message: string, payload?: Record<string, unknown>) => void
}

export const createConsoleLogger = (options: { debug: boolean }): StatusLogger => ({
  debug: (message, payload) => {
    if (!options.debug) return
    if (payload) {
      console.debug(`[status] ${message}`, payload)
    } else {
      console.debug(`[status] ${message}`)
    }
  },
  warn: (message, payload) => {
    if (payload) {
      console.warn(`[status] ${message}`, payload)
    } else {
      console.warn(`[status] ${message}`)
    }
  },
})

export const silentLogger: StatusLogger = {
  debug: () => {},
  warn: () => {},
}
