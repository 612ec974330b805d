import crypto from "crypto"
import { logEvent } from "../src/modules/logging/log-event"
import { integrityError } from "../src/modules/observability/errors"
import { CheckoutErrorCode, SessionStatus } from "./types"

const ALLOWED_TRANSITIONS: Record<SessionStatus, ReadonlySet<SessionStatus>> = {
  [SessionStatus.PENDING]: new Set([
    SessionStatus.PAID,
    SessionStatus.FAILED,
    SessionStatus.CANCELLED,
  ]),
  [SessionStatus.PAID]: new Set([SessionStatus.REFUNDED]),
  [SessionStatus.FAILED]: new Set(),
  [SessionStatus.CANCELLED]: new Set(),
  [SessionStatus.REFUNDED]: new Set(),
}

const STATUS_VALUES: ReadonlySet<string> = new Set(Object.values(SessionStatus))

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

export function isSessionStatus(value: unknown): value is SessionStatus {
  return typeof value === "string" && STATUS_VALUES.has(value)
}

/**
 * Accepts the canonical lower-case names plus the US spelling of cancelled.
 */
export function parseSessionStatus(value: unknown): SessionStatus | null {
  const normalized = readText(value).toLowerCase()
  if (normalized === "canceled") {
    return SessionStatus.CANCELLED
  }

  return isSessionStatus(normalized) ? normalized : null
}

export function isTerminalStatus(status: SessionStatus): boolean {
  return ALLOWED_TRANSITIONS[status].size === 0
}

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  if (from === to) {
    return true
  }

  return ALLOWED_TRANSITIONS[from].has(to)
}

export type ApplyTransitionResult = {
  from: SessionStatus
  to: SessionStatus
  changed: boolean
  idempotent: boolean
  valid: boolean
}

export function applyTransition(
  current: SessionStatus,
  to: SessionStatus,
  options: {
    correlation_id?: string
    on_invalid?: "throw" | "noop"
  } = {}
): ApplyTransitionResult {
  if (current === to) {
    return {
      from: current,
      to,
      changed: false,
      idempotent: true,
      valid: true,
    }
  }

  if (!canTransition(current, to)) {
    if (options.on_invalid === "noop") {
      return {
        from: current,
        to: current,
        changed: false,
        idempotent: false,
        valid: false,
      }
    }

    throw integrityError(
      CheckoutErrorCode.STATE_TRANSITION_INVALID,
      `Invalid session transition: ${current} -> ${to}`,
      {
        httpStatus: 409,
        details: {
          from: current,
          to,
          correlation_id: readText(options.correlation_id) || crypto.randomUUID(),
        },
      }
    )
  }

  return {
    from: current,
    to,
    changed: true,
    idempotent: false,
    valid: true,
  }
}

export function logSessionStateChange(input: {
  payment_id: string
  provider_key: string
  from: SessionStatus
  to: SessionStatus
  source: string
  correlation_id: string
  scopeOrLogger?: unknown
}): Record<string, unknown> {
  return logEvent(
    "CHECKOUT_SESSION_STATE_CHANGE",
    {
      from: input.from,
      to: input.to,
      source: readText(input.source) || "unknown",
    },
    input.correlation_id,
    {
      scopeOrLogger: input.scopeOrLogger,
      fields: {
        payment_id: readText(input.payment_id),
        provider_key: readText(input.provider_key),
      },
    }
  )
}

export function logIgnoredTransition(input: {
  payment_id: string
  provider_key: string
  from: SessionStatus
  requested: SessionStatus
  source: string
  correlation_id: string
  scopeOrLogger?: unknown
}): Record<string, unknown> {
  return logEvent(
    "CHECKOUT_SESSION_TRANSITION_IGNORED",
    {
      from: input.from,
      requested: input.requested,
      source: readText(input.source) || "unknown",
      reason: isTerminalStatus(input.from) ? "terminal_status" : "not_allowed",
    },
    input.correlation_id,
    {
      level: "warn",
      scopeOrLogger: input.scopeOrLogger,
      fields: {
        payment_id: readText(input.payment_id),
        provider_key: readText(input.provider_key),
      },
    }
  )
}
