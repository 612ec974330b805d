import { logSyncRun } from "../../../payments/observability"
import { SessionStatus, type SessionRecord } from "../../../payments/types"
import { logEvent } from "../logging/log-event"
import { isAppError } from "../observability/errors"
import type { ModelRef } from "./model-registry"
import type { SessionStoreRouter } from "./session-store-router"
import type { StateSyncEngine } from "./state-sync"

export const DEFAULT_STALE_MINUTES = 30
export const DEFAULT_MAX_SESSIONS = 200

export type StaleSyncInput = {
  store: SessionStoreRouter
  engine: StateSyncEngine
  now_ms?: number
  stale_minutes?: number
  max_sessions?: number
  model?: ModelRef
  correlation_id?: string
  scopeOrLogger?: unknown
}

export type StaleSyncResult = {
  scanned: number
  candidates: number
  updated: number
  unchanged: number
  failed: number
}

function toPositiveInt(value: unknown, fallback: number): number {
  const parsed = typeof value === "number" ? value : Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback
  }

  return Math.floor(parsed)
}

function isStale(session: SessionRecord, cutoffMs: number): boolean {
  const updatedAt = Date.parse(session.updated_at)
  return Number.isFinite(updatedAt) && updatedAt <= cutoffMs
}

/**
 * Re-syncs pending sessions nobody has heard about for a while. Each
 * session is synced on its own; one provider failure does not end the run.
 */
export async function syncStaleSessions(input: StaleSyncInput): Promise<StaleSyncResult> {
  const nowMs = toPositiveInt(input.now_ms, Date.now())
  const staleMinutes = toPositiveInt(input.stale_minutes, DEFAULT_STALE_MINUTES)
  const maxSessions = toPositiveInt(input.max_sessions, DEFAULT_MAX_SESSIONS)
  const cutoffMs = nowMs - staleMinutes * 60 * 1000
  const correlationId = input.correlation_id ?? `sync_${nowMs}`

  logEvent(
    "CHECKOUT_SYNC_SCAN_STARTED",
    { stale_minutes: staleMinutes, max_sessions: maxSessions },
    correlationId,
    { scopeOrLogger: input.scopeOrLogger }
  )

  const result: StaleSyncResult = {
    scanned: 0,
    candidates: 0,
    updated: 0,
    unchanged: 0,
    failed: 0,
  }

  const candidates: SessionRecord[] = []
  for await (const session of input.store.all(input.model)) {
    result.scanned += 1
    if (session.status !== SessionStatus.PENDING || !isStale(session, cutoffMs)) {
      continue
    }

    candidates.push(session)
    if (candidates.length >= maxSessions) {
      break
    }
  }
  result.candidates = candidates.length

  for (const session of candidates) {
    try {
      const outcome = await input.engine.sync(session.payment_id, {
        model: input.model,
        correlation_id: correlationId,
        source: "reconcile",
      })
      if (outcome.applied) {
        result.updated += 1
      } else {
        result.unchanged += 1
      }
    } catch (error) {
      result.failed += 1
      logEvent(
        "CHECKOUT_SYNC_SESSION_FAILED",
        { error: error instanceof Error ? error.message : String(error) },
        correlationId,
        {
          level: "error",
          scopeOrLogger: input.scopeOrLogger,
          fields: {
            payment_id: session.payment_id,
            provider_key: session.provider_key,
            error_code: isAppError(error) ? error.code : undefined,
          },
        }
      )
    }
  }

  logSyncRun(
    {
      checked_count: result.candidates,
      updated_count: result.updated,
      failed_count: result.failed,
      success: result.failed === 0,
      correlation_id: correlationId,
    },
    { scopeOrLogger: input.scopeOrLogger }
  )

  return result
}
