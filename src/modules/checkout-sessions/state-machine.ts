import {
  applyTransition,
  canTransition,
  parseSessionStatus,
} from "../../../payments/stateMachine"
import {
  SessionStatus,
  type SessionTransitionValidator,
} from "../../../payments/types"

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

// Provider vocabularies differ; everything unrecognised stays pending.
// Open-session words are listed so event type suffixes can name them too.
const PROVIDER_STATUS_ALIASES: Record<string, SessionStatus> = {
  pending: SessionStatus.PENDING,
  created: SessionStatus.PENDING,
  open: SessionStatus.PENDING,
  processing: SessionStatus.PENDING,
  requires_action: SessionStatus.PENDING,
  requires_payment_method: SessionStatus.PENDING,
  in_progress: SessionStatus.PENDING,
  paid: SessionStatus.PAID,
  succeeded: SessionStatus.PAID,
  success: SessionStatus.PAID,
  captured: SessionStatus.PAID,
  completed: SessionStatus.PAID,
  authorized: SessionStatus.PAID,
  failed: SessionStatus.FAILED,
  failure: SessionStatus.FAILED,
  error: SessionStatus.FAILED,
  declined: SessionStatus.FAILED,
  rejected: SessionStatus.FAILED,
  cancelled: SessionStatus.CANCELLED,
  canceled: SessionStatus.CANCELLED,
  expired: SessionStatus.CANCELLED,
  voided: SessionStatus.CANCELLED,
  refunded: SessionStatus.REFUNDED,
}

export function mapProviderStatus(value: unknown): SessionStatus {
  const normalized = readText(value).toLowerCase()
  return PROVIDER_STATUS_ALIASES[normalized] ?? SessionStatus.PENDING
}

/**
 * Reads the target status of a webhook event type such as
 * `payment.succeeded`. Returns null when the suffix is not a known status.
 */
export function statusFromEventType(eventType: unknown): SessionStatus | null {
  const normalized = readText(eventType).toLowerCase()
  if (!normalized) {
    return null
  }

  const suffix = normalized.slice(normalized.lastIndexOf(".") + 1)
  return PROVIDER_STATUS_ALIASES[suffix] ?? parseSessionStatus(suffix)
}

export const isSessionTransitionAllowed: SessionTransitionValidator = (
  current,
  next
) => canTransition(current, next)

export type SessionTransitionResult = {
  current: SessionStatus
  next: SessionStatus
  changed: boolean
  idempotent: boolean
  valid: boolean
}

export function transitionSessionStatus(input: {
  current: SessionStatus
  next: SessionStatus
  correlation_id: string
  on_invalid?: "throw" | "noop"
}): SessionTransitionResult {
  const transition = applyTransition(input.current, input.next, {
    correlation_id: input.correlation_id,
    on_invalid: input.on_invalid,
  })

  return {
    current: transition.from,
    next: transition.to,
    changed: transition.changed,
    idempotent: transition.idempotent,
    valid: transition.valid,
  }
}

/** Settled from the buyer's point of view; `paid` can still be refunded. */
export function isSettledSessionStatus(status: SessionStatus): boolean {
  return status !== SessionStatus.PENDING
}

export function isSuccessfulSessionStatus(status: SessionStatus): boolean {
  return status === SessionStatus.PAID
}
