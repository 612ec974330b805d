import { resolveCorrelationId } from "./correlation"
import {
  logStructured,
  type StructuredLogInput,
  type StructuredLogLevel,
} from "./structured-logger"

export type LogEventOptions = {
  level?: StructuredLogLevel
  scopeOrLogger?: unknown
  fields?: Omit<StructuredLogInput, "correlation_id" | "meta">
}

export function logEvent(
  eventName: string,
  payload: Record<string, unknown> = {},
  correlation_id?: string,
  options: LogEventOptions = {}
): Record<string, unknown> {
  const correlationId = resolveCorrelationId(correlation_id)

  return logStructured(options.scopeOrLogger, options.level ?? "info", eventName, {
    ...options.fields,
    correlation_id: correlationId,
    meta: payload,
  })
}
