import { AsyncLocalStorage } from "node:async_hooks"
import { randomUUID } from "node:crypto"

export const CORRELATION_ID_HEADER = "x-correlation-id"

export type CorrelationContext = {
  correlation_id: string
  step_name?: string
  payment_id?: string
  provider_key?: string
  model?: string
}

const contextStore = new AsyncLocalStorage<CorrelationContext>()

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function normalizeCorrelationId(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return normalizeCorrelationId(value[0])
  }

  const normalized = normalizeString(value)
  if (!normalized) {
    return undefined
  }

  const trimmed = normalized.slice(0, 128)
  if (!/^[A-Za-z0-9._:-]+$/.test(trimmed)) {
    return undefined
  }

  return trimmed
}

function normalizeEntityId(value: unknown): string | undefined {
  const normalized = normalizeString(value)
  if (!normalized) {
    return undefined
  }

  return normalized.slice(0, 128)
}

export function generateCorrelationId(): string {
  return randomUUID()
}

export function getCorrelationContext(): CorrelationContext | undefined {
  return contextStore.getStore()
}

export function resolveCorrelationId(explicit?: unknown): string {
  const fromExplicit = normalizeCorrelationId(explicit)
  if (fromExplicit) {
    return fromExplicit
  }

  const fromContext = normalizeCorrelationId(getCorrelationContext()?.correlation_id)
  if (fromContext) {
    return fromContext
  }

  return generateCorrelationId()
}

export function runWithCorrelationContext<T>(
  correlationId: unknown,
  fn: () => T
): T {
  const resolved = resolveCorrelationId(correlationId)
  return contextStore.run({ correlation_id: resolved }, fn)
}

/**
 * Merges fields into the active context. Outside of
 * `runWithCorrelationContext` this starts a context for the current
 * async resource.
 */
export function setCorrelationContext(
  input: Partial<CorrelationContext>
): CorrelationContext {
  const existing = getCorrelationContext()
  const correlationId = resolveCorrelationId(
    input.correlation_id ?? existing?.correlation_id
  )

  const next: CorrelationContext = {
    correlation_id: correlationId,
    step_name: normalizeString(input.step_name ?? existing?.step_name),
    payment_id: normalizeEntityId(input.payment_id ?? existing?.payment_id),
    provider_key: normalizeEntityId(input.provider_key ?? existing?.provider_key),
    model: normalizeEntityId(input.model ?? existing?.model),
  }

  if (existing) {
    Object.assign(existing, next)
    return existing
  }

  contextStore.enterWith(next)
  return next
}

function readHeaderValue(headers: unknown): unknown {
  if (!headers || typeof headers !== "object") {
    return undefined
  }

  const lower = Reflect.get(headers, CORRELATION_ID_HEADER)
  return lower ?? Reflect.get(headers, "X-Correlation-Id")
}

export type CorrelationSource = {
  headers?: unknown
  get?: (name: string) => unknown
  correlation_id?: unknown
}

export function extractCorrelationIdFromRequest(req: CorrelationSource): string {
  const direct = normalizeCorrelationId(req.correlation_id)
  if (direct) {
    return direct
  }

  const fromGetter =
    typeof req.get === "function"
      ? normalizeCorrelationId(req.get(CORRELATION_ID_HEADER))
      : undefined
  if (fromGetter) {
    return fromGetter
  }

  const fromHeaders = normalizeCorrelationId(readHeaderValue(req.headers))
  if (fromHeaders) {
    return fromHeaders
  }

  return resolveCorrelationId()
}
