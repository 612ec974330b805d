import crypto from "crypto"
import { z } from "zod"
import type { CheckoutWebhookEvent } from "../../../payments/types"
import { WebhookPayloadError } from "./errors"
import { mapProviderStatus, statusFromEventType } from "./state-machine"

export const DEFAULT_WEBHOOK_SOURCE = "checkout"

const optionalText = z.string().trim().min(1).optional()

const webhookBodySchema = z
  .object({
    payment_id: optionalText,
    session_id: optionalText,
    event_id: optionalText,
    event_type: optionalText,
    status: optionalText,
    state: optionalText,
    provider: optionalText,
    occurred_at: optionalText,
  })
  .passthrough()

function toPayloadHash(rawBody: Buffer): string {
  return crypto.createHash("sha256").update(rawBody).digest("hex")
}

function parseJson(rawBody: Buffer): unknown {
  try {
    return JSON.parse(rawBody.toString("utf8"))
  } catch (error) {
    throw new WebhookPayloadError("Webhook body is not valid JSON.", { cause: error })
  }
}

/**
 * Decodes a verified webhook body. The target status comes from an explicit
 * `status`/`state` field when present, otherwise from the `event_type`
 * suffix (`payment.succeeded` -> paid).
 */
export function decodeCheckoutWebhook(rawBody: Buffer): CheckoutWebhookEvent {
  const parsed = webhookBodySchema.safeParse(parseJson(rawBody))
  if (!parsed.success) {
    throw new WebhookPayloadError("Malformed webhook payload.", {
      cause: parsed.error,
      details: { issues: parsed.error.issues.map((issue) => issue.path.join(".")) },
    })
  }

  const body = parsed.data
  const paymentId = body.payment_id ?? body.session_id
  if (!paymentId) {
    throw new WebhookPayloadError("Webhook payload is missing payment_id.")
  }

  const rawStatus = body.status ?? body.state
  const statusMapped = rawStatus
    ? mapProviderStatus(rawStatus)
    : statusFromEventType(body.event_type)
  if (!statusMapped) {
    throw new WebhookPayloadError("Webhook event type is not supported.", {
      details: { event_type: body.event_type ?? null },
    })
  }

  return {
    provider: (body.provider ?? DEFAULT_WEBHOOK_SOURCE).toLowerCase(),
    event_id: body.event_id ?? `hash_${toPayloadHash(rawBody)}`,
    event_type: (body.event_type ?? `payment.${statusMapped}`).toLowerCase(),
    payment_id: paymentId,
    status_mapped: statusMapped,
    raw_status: rawStatus,
    occurred_at: body.occurred_at ?? new Date().toISOString(),
    payload: body,
  }
}
