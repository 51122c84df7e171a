// observability/logger.ts

import winston from "winston"

import { isOneOf } from "../engine/errors"

/*
|--------------------------------------------------------------------------
| Logger Configuration
|--------------------------------------------------------------------------
| One process-wide logger; modules take a child tagged with their component
|--------------------------------------------------------------------------
*/

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const { combine, timestamp, printf, colorize, errors } =
  winston.format

const logFormat = printf(
  ({ level, message, timestamp, stack, component, ...meta }) => {
    const tag = typeof component === "string" ? ` (${component})` : ""
    const ctx = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ""
    const body = typeof stack === "string" ? stack : String(message)
    return `${String(timestamp)} [${level}]${tag} ${body}${ctx}`
  }
)

export function resolveLevel(raw = process.env.LOG_LEVEL): LogLevel | "silent" {
  const v = (raw ?? "").trim().toLowerCase()
  if (v === "silent") return "silent"
  if (isOneOf(v, LOG_LEVELS)) return v
  return "info"
}

const initial = resolveLevel()

export const logger = winston.createLogger({
  level: initial === "silent" ? "error" : initial,
  silent: initial === "silent",
  format: combine(
    errors({ stack: true }),
    timestamp(),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(
        errors({ stack: true }),
        colorize(),
        timestamp(),
        logFormat
      ),
    }),
  ],
})

export function setLogLevel(level: LogLevel | "silent"): void {
  logger.silent = level === "silent"
  if (level !== "silent") logger.level = level
}

export function childLogger(component: string): winston.Logger {
  return logger.child({ component })
}
