import type { PgConnectionLike } from "./pg-session-model"

export const CHECKOUT_WEBHOOK_EVENTS_TABLE = "checkout_webhook_events"

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

export type MarkProcessedInput = {
  provider: string
  event_id: string
}

export type MarkProcessedResult = {
  processed: boolean
  already_processed: boolean
}

/**
 * Remembers which webhook events were handled so a redelivery is a no-op.
 */
export interface WebhookEventRepository {
  markProcessed(input: MarkProcessedInput): Promise<MarkProcessedResult>

  /** Forgets a mark so a later delivery of the same event is applied. */
  release(input: MarkProcessedInput): Promise<void>
}

function toKey(input: MarkProcessedInput): { provider: string; event_id: string } {
  return {
    provider: readText(input.provider).toLowerCase(),
    event_id: readText(input.event_id),
  }
}

export const DEFAULT_MAX_REMEMBERED_EVENTS = 10_000

/**
 * Process-local marks. Only the most recent `max_entries` events are
 * remembered; an older event delivered again is applied again, which the
 * state machine turns into a no-op.
 */
export class InMemoryWebhookEventRepository implements WebhookEventRepository {
  private readonly seen = new Set<string>()
  private readonly maxEntries: number

  constructor(options: { max_entries?: number } = {}) {
    this.maxEntries = Math.max(
      1,
      Math.floor(options.max_entries ?? DEFAULT_MAX_REMEMBERED_EVENTS)
    )
  }

  get size(): number {
    return this.seen.size
  }

  async markProcessed(input: MarkProcessedInput): Promise<MarkProcessedResult> {
    const key = toKey(input)
    const composite = `${key.provider}\u0000${key.event_id}`
    if (this.seen.has(composite)) {
      return { processed: false, already_processed: true }
    }

    this.seen.add(composite)
    // Sets iterate in insertion order, so the first key is the oldest mark.
    for (const oldest of this.seen) {
      if (this.seen.size <= this.maxEntries) {
        break
      }
      this.seen.delete(oldest)
    }

    return { processed: true, already_processed: false }
  }

  async release(input: MarkProcessedInput): Promise<void> {
    const key = toKey(input)
    this.seen.delete(`${key.provider}\u0000${key.event_id}`)
  }
}

export class PgWebhookEventRepository implements WebhookEventRepository {
  private schemaEnsured = false

  constructor(private readonly pgConnection: PgConnectionLike) {}

  async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) {
      return
    }

    await this.pgConnection.raw(`
      CREATE TABLE IF NOT EXISTS ${CHECKOUT_WEBHOOK_EVENTS_TABLE} (
        provider TEXT NOT NULL,
        event_id TEXT NOT NULL,
        received_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE (provider, event_id)
      )
    `)

    this.schemaEnsured = true
  }

  async markProcessed(input: MarkProcessedInput): Promise<MarkProcessedResult> {
    await this.ensureSchema()

    const key = toKey(input)
    const result = await this.pgConnection.raw(
      `
        INSERT INTO ${CHECKOUT_WEBHOOK_EVENTS_TABLE} (provider, event_id)
        VALUES (?, ?)
        ON CONFLICT (provider, event_id) DO NOTHING
        RETURNING provider, event_id
      `,
      [key.provider, key.event_id]
    )

    const inserted = Array.isArray(result.rows) && result.rows.length > 0
    return {
      processed: inserted,
      already_processed: !inserted,
    }
  }

  async release(input: MarkProcessedInput): Promise<void> {
    await this.ensureSchema()

    const key = toKey(input)
    await this.pgConnection.raw(
      `DELETE FROM ${CHECKOUT_WEBHOOK_EVENTS_TABLE} WHERE provider = ? AND event_id = ?`,
      [key.provider, key.event_id]
    )
  }
}
