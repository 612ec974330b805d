import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import { getCorrelationContext, resolveCorrelationId } from "./correlation"

export type StructuredLogLevel = "debug" | "info" | "warn" | "error"

export type LoggerLike = {
  info?: (message: string) => void
  warn?: (message: string) => void
  error?: (message: string) => void
  debug?: (message: string) => void
}

type ScopeLike = {
  resolve: (key: string) => unknown
}

export type StructuredLogInput = {
  correlation_id?: string
  step_name?: string
  payment_id?: string
  provider_key?: string
  model?: string
  error_code?: string
  meta?: Record<string, unknown>
}

export const REDACTED = "[REDACTED]"

const SECRET_KEY_PATTERN =
  /(secret|token|password|authorization|cookie|signature|api[_-]?key|private[_-]?key)/i

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value)
}

export function sanitizeValue(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (depth > 3) {
    return "[TRUNCATED]"
  }

  if (typeof value === "string") {
    return value.length > 300 ? `${value.slice(0, 300)}...` : value
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return value
  }

  if (Array.isArray(value)) {
    return value.slice(0, 25).map((item) => sanitizeValue(item, depth + 1))
  }

  if (value instanceof Date) {
    return value.toISOString()
  }

  if (isRecord(value)) {
    const sanitized: Record<string, unknown> = {}

    for (const [key, nestedValue] of Object.entries(value)) {
      sanitized[key] = SECRET_KEY_PATTERN.test(key)
        ? REDACTED
        : sanitizeValue(nestedValue, depth + 1)
    }

    return sanitized
  }

  return String(value)
}

function isLoggerLike(value: object): value is LoggerLike {
  return (
    typeof Reflect.get(value, "info") === "function" ||
    typeof Reflect.get(value, "warn") === "function" ||
    typeof Reflect.get(value, "error") === "function"
  )
}

function isScopeLike(value: object): value is ScopeLike {
  return typeof Reflect.get(value, "resolve") === "function"
}

function tryResolve(scope: ScopeLike, key: string): unknown {
  try {
    return scope.resolve(key)
  } catch {
    // Medusa containers throw on unregistered keys.
    return undefined
  }
}

export function resolveLogger(scopeOrLogger?: unknown): LoggerLike | undefined {
  if (!scopeOrLogger || typeof scopeOrLogger !== "object") {
    return undefined
  }

  if (isLoggerLike(scopeOrLogger)) {
    return scopeOrLogger
  }

  if (!isScopeLike(scopeOrLogger)) {
    return undefined
  }

  const resolved =
    tryResolve(scopeOrLogger, ContainerRegistrationKeys.LOGGER) ??
    tryResolve(scopeOrLogger, "logger")

  return resolved && typeof resolved === "object" && isLoggerLike(resolved)
    ? resolved
    : undefined
}

function toPayload(
  level: StructuredLogLevel,
  message: string,
  input: StructuredLogInput
): Record<string, unknown> {
  const context = getCorrelationContext()
  const correlationId = resolveCorrelationId(
    input.correlation_id ?? context?.correlation_id
  )

  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    message,
    correlation_id: correlationId,
  }

  const stepName = normalizeString(input.step_name ?? context?.step_name)
  const paymentId = normalizeString(input.payment_id ?? context?.payment_id)
  const providerKey = normalizeString(input.provider_key ?? context?.provider_key)
  const model = normalizeString(input.model ?? context?.model)
  const errorCode = normalizeString(input.error_code)

  if (stepName) {
    payload.step_name = stepName
  }
  if (paymentId) {
    payload.payment_id = paymentId
  }
  if (providerKey) {
    payload.provider_key = providerKey
  }
  if (model) {
    payload.model = model
  }
  if (errorCode) {
    payload.error_code = errorCode
  }

  const meta = sanitizeValue(input.meta ?? {})
  if (isRecord(meta) && Object.keys(meta).length > 0) {
    payload.meta = meta
  }

  return payload
}

function writeToConsole(level: StructuredLogLevel, line: string): void {
  if (level === "error") {
    console.error(line)
    return
  }

  if (level === "warn") {
    console.warn(line)
    return
  }

  if (level === "debug") {
    console.debug(line)
    return
  }

  console.log(line)
}

/**
 * Writes one JSON line. `scopeOrLogger` may be a logger or a Medusa
 * container; without either the line goes to the console.
 */
export function logStructured(
  scopeOrLogger: unknown,
  level: StructuredLogLevel,
  message: string,
  input: StructuredLogInput = {}
): Record<string, unknown> {
  const payload = toPayload(level, message, input)
  const serialized = JSON.stringify(payload)
  const logger = resolveLogger(scopeOrLogger)
  const write = logger?.[level] ?? logger?.info

  if (write) {
    write.call(logger, serialized)
    return payload
  }

  writeToConsole(level, serialized)
  return payload
}
