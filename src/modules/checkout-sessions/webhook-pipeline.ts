import { logWebhookEvent } from "../../../payments/observability"
import type { CheckoutWebhookEvent, SessionStatus } from "../../../payments/types"
import { resolveCorrelationId } from "../logging/correlation"
import { logEvent } from "../logging/log-event"
import { isAppError } from "../observability/errors"
import { InvalidSignatureError, NotFoundError } from "./errors"
import type { StateSyncEngine } from "./state-sync"
import { decodeCheckoutWebhook } from "./webhook-event"
import type { WebhookEventRepository } from "./webhook-event-repository"
import { verifyWebhookSignature } from "./webhook-verifier"

export type ProcessWebhookInput = {
  raw_body: Buffer | string
  signature: string | null | undefined
  secret: string | null | undefined
  repository: WebhookEventRepository
  engine: StateSyncEngine
  correlation_id?: string
  scopeOrLogger?: unknown
}

export type ProcessWebhookResult = {
  processed: boolean
  deduped: boolean
  matched: boolean
  applied: boolean
  provider: string
  event_id: string
  event_type: string
  payment_id: string
  status: SessionStatus | null
  correlation_id: string
}

function toBuffer(value: Buffer | string): Buffer {
  return Buffer.isBuffer(value) ? value : Buffer.from(value, "utf8")
}

/**
 * verify -> decode -> de-duplicate -> apply. Nothing is read or written
 * before the signature checks out.
 */
export async function processCheckoutWebhook(
  input: ProcessWebhookInput
): Promise<ProcessWebhookResult> {
  const correlationId = resolveCorrelationId(input.correlation_id)
  const rawBody = toBuffer(input.raw_body)

  try {
    verifyWebhookSignature(rawBody, input.signature, input.secret)
  } catch (error) {
    if (error instanceof InvalidSignatureError) {
      logEvent(
        "CHECKOUT_WEBHOOK_SIGNATURE_REJECTED",
        {
          reason: error.details?.reason ?? "unknown",
          body_bytes: rawBody.length,
        },
        correlationId,
        {
          level: "warn",
          scopeOrLogger: input.scopeOrLogger,
          fields: { error_code: error.code },
        }
      )
    }
    throw error
  }

  let event: CheckoutWebhookEvent
  try {
    event = decodeCheckoutWebhook(rawBody)
  } catch (error) {
    logWebhookEvent(
      {
        provider: "unknown",
        event_type: "unknown",
        event_id: "unknown",
        matched: false,
        deduped: false,
        applied: false,
        success: false,
        error_code: isAppError(error) ? error.code : null,
        correlation_id: correlationId,
      },
      { level: "warn", scopeOrLogger: input.scopeOrLogger }
    )
    throw error
  }

  const base = {
    provider: event.provider,
    event_id: event.event_id,
    event_type: event.event_type,
    payment_id: event.payment_id,
    correlation_id: correlationId,
  }
  const mark = { provider: event.provider, event_id: event.event_id }

  const dedupe = await input.repository.markProcessed(mark)
  if (!dedupe.processed) {
    logWebhookEvent(
      { ...base, matched: false, deduped: true, applied: false, success: true },
      { scopeOrLogger: input.scopeOrLogger }
    )

    return {
      ...base,
      processed: false,
      deduped: true,
      matched: false,
      applied: false,
      status: null,
    }
  }

  try {
    const outcome = await input.engine.applyTransition({
      payment_id: event.payment_id,
      target: event.status_mapped,
      raw_payload: event.payload,
      source: "webhook",
      correlation_id: correlationId,
    })

    logWebhookEvent(
      { ...base, matched: true, deduped: false, applied: outcome.applied, success: true },
      { scopeOrLogger: input.scopeOrLogger }
    )

    return {
      ...base,
      processed: true,
      deduped: false,
      matched: true,
      applied: outcome.applied,
      status: outcome.session.status,
    }
  } catch (error) {
    // Let a redelivery try again once the session exists or the store recovers.
    await input.repository.release(mark)

    if (error instanceof NotFoundError) {
      logWebhookEvent(
        { ...base, matched: false, deduped: false, applied: false, success: true },
        { level: "warn", scopeOrLogger: input.scopeOrLogger }
      )

      return {
        ...base,
        processed: true,
        deduped: false,
        matched: false,
        applied: false,
        status: null,
      }
    }

    logWebhookEvent(
      {
        ...base,
        matched: false,
        deduped: false,
        applied: false,
        success: false,
        error_code: isAppError(error) ? error.code : null,
      },
      { scopeOrLogger: input.scopeOrLogger }
    )
    throw error
  }
}
