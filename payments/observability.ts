import { logEvent } from "../src/modules/logging/log-event"
import { increment, observeDuration } from "../src/modules/observability/metrics"
import type { SessionStatus } from "./types"

type LogLevel = "debug" | "info" | "warn" | "error"

type LogOptions = {
  scopeOrLogger?: unknown
  level?: LogLevel
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function toNonNegativeInt(value: number): number {
  if (!Number.isFinite(value)) {
    return 0
  }

  return value < 0 ? 0 : Math.round(value)
}

export function logProviderCall(
  input: {
    provider: string
    method: string
    duration_ms: number
    success: boolean
    error_code?: string | null
    correlation_id: string
    payment_id?: string
  },
  options: LogOptions = {}
): Record<string, unknown> {
  const provider = readText(input.provider).toLowerCase() || "unknown"
  const method = readText(input.method).toLowerCase() || "unknown"
  const durationMs = toNonNegativeInt(input.duration_ms)
  const errorCode = readText(input.error_code) || null

  const payload = logEvent(
    "CHECKOUT_PROVIDER_CALL",
    {
      method,
      duration_ms: durationMs,
      success: input.success,
    },
    input.correlation_id,
    {
      level: options.level ?? (input.success ? "info" : "error"),
      scopeOrLogger: options.scopeOrLogger,
      fields: {
        provider_key: provider,
        payment_id: readText(input.payment_id) || undefined,
        error_code: errorCode ?? undefined,
      },
    }
  )

  increment("checkout.provider.call.total", {
    provider,
    method,
    success: input.success,
    error_code: errorCode,
  })
  observeDuration("checkout.provider.call.duration_ms", durationMs, {
    provider,
    method,
    success: input.success,
  })

  return payload
}

export function logWebhookEvent(
  input: {
    provider: string
    event_type: string
    event_id: string
    payment_id?: string
    matched: boolean
    deduped: boolean
    applied: boolean
    success: boolean
    error_code?: string | null
    correlation_id: string
  },
  options: LogOptions = {}
): Record<string, unknown> {
  const provider = readText(input.provider).toLowerCase() || "unknown"
  const eventType = readText(input.event_type).toLowerCase() || "unknown"
  const eventId = readText(input.event_id) || "unknown"
  const errorCode = readText(input.error_code) || null

  const payload = logEvent(
    "CHECKOUT_WEBHOOK_EVENT",
    {
      event_type: eventType,
      event_id: eventId,
      matched: input.matched,
      deduped: input.deduped,
      applied: input.applied,
      success: input.success,
    },
    input.correlation_id,
    {
      level: options.level ?? (input.success ? "info" : "error"),
      scopeOrLogger: options.scopeOrLogger,
      fields: {
        provider_key: provider,
        payment_id: readText(input.payment_id) || undefined,
        error_code: errorCode ?? undefined,
      },
    }
  )

  increment("checkout.webhook.event.total", {
    provider,
    event_type: eventType,
    success: input.success,
    matched: input.matched,
    deduped: input.deduped,
    error_code: errorCode,
  })

  return payload
}

export function recordTransitionMetric(input: {
  provider: string
  from: SessionStatus
  to: SessionStatus
  source: string
  applied: boolean
}): void {
  increment("checkout.session.transition.total", {
    provider: readText(input.provider).toLowerCase() || "unknown",
    from: input.from,
    to: input.to,
    source: input.source,
    applied: input.applied,
  })
}

export function logSyncRun(
  input: {
    checked_count: number
    updated_count: number
    failed_count: number
    success: boolean
    correlation_id: string
  },
  options: LogOptions = {}
): Record<string, unknown> {
  const checkedCount = toNonNegativeInt(input.checked_count)
  const updatedCount = toNonNegativeInt(input.updated_count)
  const failedCount = toNonNegativeInt(input.failed_count)

  const payload = logEvent(
    "CHECKOUT_SYNC_RUN",
    {
      checked_count: checkedCount,
      updated_count: updatedCount,
      failed_count: failedCount,
      success: input.success,
    },
    input.correlation_id,
    {
      level: options.level ?? (input.success ? "info" : "error"),
      scopeOrLogger: options.scopeOrLogger,
    }
  )

  increment("checkout.sync.run.total", {
    success: input.success,
  })

  return payload
}
