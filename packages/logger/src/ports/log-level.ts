export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 */
export const LogLevels = {
  /** Finest-grained diagnostic information, e.g. every decode call. */
  Trace: 10,
  /** Details useful while investigating a request, e.g. ignored query keys. */
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]
