export const SessionStatus = {
  PENDING: "pending",
  PAID: "paid",
  FAILED: "failed",
  CANCELLED: "cancelled",
  REFUNDED: "refunded",
} as const

export type SessionStatus = (typeof SessionStatus)[keyof typeof SessionStatus]

export const CheckoutErrorCode = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
  NOT_SUPPORTED: "NOT_SUPPORTED",
  STATE_TRANSITION_INVALID: "STATE_TRANSITION_INVALID",
  CHECKOUT_CONFIG_INVALID: "CHECKOUT_CONFIG_INVALID",
  CHECKOUT_MODEL_NOT_REGISTERED: "CHECKOUT_MODEL_NOT_REGISTERED",
  CHECKOUT_INPUT_INVALID: "CHECKOUT_INPUT_INVALID",
  CHECKOUT_PROVIDER_UNKNOWN: "CHECKOUT_PROVIDER_UNKNOWN",
  CHECKOUT_PROVIDER_FAILED: "CHECKOUT_PROVIDER_FAILED",
  CHECKOUT_PROVIDER_TIMEOUT: "CHECKOUT_PROVIDER_TIMEOUT",
  CHECKOUT_PROVIDER_INVALID_RESPONSE: "CHECKOUT_PROVIDER_INVALID_RESPONSE",
  CHECKOUT_SESSION_NOT_FOUND: "CHECKOUT_SESSION_NOT_FOUND",
  CHECKOUT_SESSION_DUPLICATE: "CHECKOUT_SESSION_DUPLICATE",
  CHECKOUT_SESSION_CONFLICT: "CHECKOUT_SESSION_CONFLICT",
  WEBHOOK_SIGNATURE_INVALID: "WEBHOOK_SIGNATURE_INVALID",
  WEBHOOK_PAYLOAD_INVALID: "WEBHOOK_PAYLOAD_INVALID",
} as const

export type CheckoutErrorCode =
  (typeof CheckoutErrorCode)[keyof typeof CheckoutErrorCode]

export type SessionRecord = {
  id: string
  payment_id: string
  provider_key: string
  amount: string
  currency: string
  status: SessionStatus
  raw_provider_payload: Record<string, unknown>
  redirect_url: string | null
  metadata: Record<string, unknown>
  created_at: string
  updated_at: string
}

/**
 * Where a state-affecting update came from. Recorded on every transition log
 * line so a reader can tell webhook callbacks apart from admin actions.
 */
export type TransitionSource =
  | "webhook"
  | "sync"
  | "refund"
  | "cancel"
  | "reconcile"
  | "manual"

export type CheckoutWebhookEvent = {
  provider: string
  event_id: string
  event_type: string
  payment_id: string
  status_mapped: SessionStatus
  raw_status?: string
  occurred_at: string
  payload: Record<string, unknown>
}

export type SessionTransitionValidator = (
  current: SessionStatus,
  next: SessionStatus
) => boolean
