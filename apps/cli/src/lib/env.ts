/**
 * CLI environment, validated once at startup.
 * A malformed value throws immediately instead of being ignored.
 */

import { LOG_LEVELS, type LogLevel } from './logger'

function optional(source: NodeJS.ProcessEnv, key: string, fallback: string): string {
  return source[key] ?? fallback
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value)
}

export interface CliEnv {
  LOG_LEVEL: LogLevel
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): CliEnv {
  const level = optional(source, 'LOG_LEVEL', 'info').toLowerCase()
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid LOG_LEVEL: ${level}. Expected one of ${LOG_LEVELS.join(', ')}.`,
    )
  }
  return { LOG_LEVEL: level }
}
