import type { SessionStatus } from "../../../payments/types"
import { resolveCorrelationId } from "../logging/correlation"
import { logEvent } from "../logging/log-event"
import { isAppError } from "../observability/errors"
import { NotFoundError } from "./errors"
import type { ModelRef } from "./model-registry"
import type { SessionAction, StateSyncEngine } from "./state-sync"

export type BulkItemOutcome = "applied" | "noop" | "not_found" | "failed"

export type BulkItemResult = {
  payment_id: string
  outcome: BulkItemOutcome
  status: SessionStatus | null
  error_code?: string
  message?: string
}

export type BulkActionResult = {
  action: SessionAction
  results: BulkItemResult[]
  summary: Record<BulkItemOutcome, number>
  correlation_id: string
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

/**
 * Applies one admin action to many sessions. A failure on one session is
 * reported in its own result and does not stop the rest.
 */
export async function runBulkAction(input: {
  engine: StateSyncEngine
  action: SessionAction
  payment_ids: readonly string[]
  model?: ModelRef
  correlation_id?: string
  scopeOrLogger?: unknown
}): Promise<BulkActionResult> {
  const correlationId = resolveCorrelationId(input.correlation_id)
  const paymentIds = Array.from(
    new Set(input.payment_ids.map((paymentId) => readText(paymentId)).filter(Boolean))
  )
  const results: BulkItemResult[] = []

  for (const paymentId of paymentIds) {
    try {
      const outcome = await input.engine.perform(input.action, paymentId, {
        model: input.model,
        correlation_id: correlationId,
      })
      results.push({
        payment_id: paymentId,
        outcome: outcome.applied ? "applied" : "noop",
        status: outcome.session.status,
      })
    } catch (error) {
      const notFound = error instanceof NotFoundError
      results.push({
        payment_id: paymentId,
        outcome: notFound ? "not_found" : "failed",
        status: null,
        error_code: isAppError(error) ? error.code : "INTERNAL_ERROR",
        message: isAppError(error) ? error.message : "Unexpected error.",
      })

      if (!notFound) {
        logEvent(
          "CHECKOUT_BULK_ACTION_ITEM_FAILED",
          {
            action: input.action,
            error: error instanceof Error ? error.message : String(error),
          },
          correlationId,
          {
            level: "error",
            scopeOrLogger: input.scopeOrLogger,
            fields: {
              payment_id: paymentId,
              error_code: isAppError(error) ? error.code : undefined,
            },
          }
        )
      }
    }
  }

  const summary: Record<BulkItemOutcome, number> = {
    applied: 0,
    noop: 0,
    not_found: 0,
    failed: 0,
  }
  for (const result of results) {
    summary[result.outcome] += 1
  }

  logEvent(
    "CHECKOUT_BULK_ACTION_COMPLETED",
    {
      action: input.action,
      requested: paymentIds.length,
      ...summary,
    },
    correlationId,
    {
      level: summary.failed > 0 ? "warn" : "info",
      scopeOrLogger: input.scopeOrLogger,
    }
  )

  return {
    action: input.action,
    results,
    summary,
    correlation_id: correlationId,
  }
}
