import { config, type LogLevel } from '../../config.ts'

const PREFIX = '[WeeklyShop]'

const RANK: Record<LogLevel, number> = { silent: 0, info: 1, debug: 2 }

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return RANK[config.logLevel] >= RANK[level]
}

export function logInfo(message: string): void {
  if (enabled('info')) console.info(`${PREFIX} ${message}`)
}

export function logDebug(message: string): void {
  if (enabled('debug')) console.debug(`${PREFIX} ${message}`)
}

export function logWarn(message: string): void {
  if (enabled('info')) console.warn(`${PREFIX} ${message}`)
}
