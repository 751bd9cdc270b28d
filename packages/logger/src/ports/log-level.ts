/**
 * Numeric log severity levels (higher = more severe). Values match pino's.
 */
export const LogLevels = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
} as const

export type LogLevelName = keyof typeof LogLevels

export type LogLevel = (typeof LogLevels)[LogLevelName]

export function levelName(level: number): LogLevelName | undefined {
  for (const [name, value] of Object.entries(LogLevels)) {
    if (value === level && isLogLevelName(name)) return name
  }
  return undefined
}

function isLogLevelName(name: string): name is LogLevelName {
  return name in LogLevels
}
