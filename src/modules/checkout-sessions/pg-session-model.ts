import { z } from "zod"
import { SessionStatus, type SessionRecord } from "../../../payments/types"
import { ConfigurationError, DuplicateSessionError } from "./errors"
import type { SessionStorageModel } from "./session-models"

type QueryResultLike = {
  rows?: Array<Record<string, unknown>>
}

export type PgConnectionLike = {
  raw: (query: string, bindings?: unknown[]) => Promise<QueryResultLike>
}

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]{0,62}$/
const DEFAULT_PAGE_SIZE = 100

const SELECT_COLUMNS = `
  id, payment_id, provider_key, amount, currency, status,
  raw_provider_payload, redirect_url, metadata, created_at, updated_at
`

const timestampSchema = z
  .union([z.date(), z.string().min(1)])
  .transform((value) => new Date(value).toISOString())

const jsonObjectSchema = z
  .union([z.record(z.unknown()), z.string()])
  .transform((value, ctx): Record<string, unknown> => {
    if (typeof value !== "string") {
      return value
    }

    const parsed: unknown = JSON.parse(value)
    const result = z.record(z.unknown()).safeParse(parsed)
    if (!result.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected a JSON object" })
      return z.NEVER
    }

    return result.data
  })

const sessionRowSchema = z.object({
  id: z.string().min(1),
  payment_id: z.string().min(1),
  provider_key: z.string().min(1),
  amount: z.union([z.string(), z.number()]).transform((value) => String(value)),
  currency: z.string().min(1),
  status: z.nativeEnum(SessionStatus),
  raw_provider_payload: jsonObjectSchema,
  redirect_url: z.string().nullable(),
  metadata: jsonObjectSchema,
  created_at: timestampSchema,
  updated_at: timestampSchema,
})

export function toSessionRecord(row: Record<string, unknown>): SessionRecord {
  return sessionRowSchema.parse(row)
}

/**
 * A session model backed by one Postgres table, through the knex-style
 * connection Medusa registers as `PG_CONNECTION`.
 */
export class PgSessionModel implements SessionStorageModel {
  readonly name: string
  private readonly table: string
  private readonly pageSize: number
  private schemaEnsured = false

  constructor(
    private readonly pgConnection: PgConnectionLike,
    options: {
      table: string
      name?: string
      page_size?: number
    }
  ) {
    const table = options.table.trim().toLowerCase()
    if (!TABLE_NAME_PATTERN.test(table)) {
      throw new ConfigurationError(`Invalid session table name: ${options.table}`, {
        code: "CHECKOUT_CONFIG_INVALID",
        httpStatus: 500,
      })
    }

    this.table = table
    this.name = options.name?.trim() || table
    this.pageSize = Math.max(1, Math.floor(options.page_size ?? DEFAULT_PAGE_SIZE))
  }

  async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) {
      return
    }

    await this.pgConnection.raw(`
      CREATE TABLE IF NOT EXISTS ${this.table} (
        id TEXT PRIMARY KEY,
        payment_id TEXT NOT NULL UNIQUE,
        provider_key TEXT NOT NULL,
        amount TEXT NOT NULL,
        currency TEXT NOT NULL,
        status TEXT NOT NULL,
        raw_provider_payload JSONB NOT NULL DEFAULT '{}'::jsonb,
        redirect_url TEXT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL
      )
    `)
    await this.pgConnection.raw(`
      CREATE INDEX IF NOT EXISTS ${this.table}_created_at_idx
        ON ${this.table} (created_at, id)
    `)

    this.schemaEnsured = true
  }

  async insert(record: SessionRecord): Promise<void> {
    await this.ensureSchema()

    const result = await this.pgConnection.raw(
      `
        INSERT INTO ${this.table} (
          id, payment_id, provider_key, amount, currency, status,
          raw_provider_payload, redirect_url, metadata, created_at, updated_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?::jsonb, ?, ?::jsonb, ?, ?)
        ON CONFLICT (payment_id) DO NOTHING
        RETURNING id
      `,
      [
        record.id,
        record.payment_id,
        record.provider_key,
        record.amount,
        record.currency,
        record.status,
        JSON.stringify(record.raw_provider_payload),
        record.redirect_url,
        JSON.stringify(record.metadata),
        record.created_at,
        record.updated_at,
      ]
    )

    if (!Array.isArray(result.rows) || result.rows.length === 0) {
      throw new DuplicateSessionError(record.payment_id, this.name)
    }
  }

  async findByPaymentId(paymentId: string): Promise<SessionRecord | null> {
    await this.ensureSchema()

    const result = await this.pgConnection.raw(
      `SELECT ${SELECT_COLUMNS} FROM ${this.table} WHERE payment_id = ? LIMIT 1`,
      [paymentId]
    )

    const row = result.rows?.[0]
    return row ? toSessionRecord(row) : null
  }

  async replace(
    record: SessionRecord,
    expectedStatus: SessionStatus
  ): Promise<boolean> {
    await this.ensureSchema()

    // Only mutable columns are written.
    const result = await this.pgConnection.raw(
      `
        UPDATE ${this.table}
        SET status = ?,
            raw_provider_payload = ?::jsonb,
            redirect_url = ?,
            metadata = ?::jsonb,
            updated_at = ?
        WHERE payment_id = ? AND status = ?
        RETURNING id
      `,
      [
        record.status,
        JSON.stringify(record.raw_provider_payload),
        record.redirect_url,
        JSON.stringify(record.metadata),
        record.updated_at,
        record.payment_id,
        expectedStatus,
      ]
    )

    return Array.isArray(result.rows) && result.rows.length > 0
  }

  async *scan(): AsyncIterable<SessionRecord> {
    await this.ensureSchema()

    let cursor: { created_at: string; id: string } | null = null

    while (true) {
      const result: QueryResultLike = cursor
        ? await this.pgConnection.raw(
            `
              SELECT ${SELECT_COLUMNS} FROM ${this.table}
              WHERE (created_at, id) > (?, ?)
              ORDER BY created_at ASC, id ASC
              LIMIT ?
            `,
            [cursor.created_at, cursor.id, this.pageSize]
          )
        : await this.pgConnection.raw(
            `
              SELECT ${SELECT_COLUMNS} FROM ${this.table}
              ORDER BY created_at ASC, id ASC
              LIMIT ?
            `,
            [this.pageSize]
          )

      const rows = result.rows ?? []
      let last: SessionRecord | null = null
      for (const row of rows) {
        last = toSessionRecord(row)
        yield last
      }

      if (!last || rows.length < this.pageSize) {
        return
      }

      cursor = { created_at: last.created_at, id: last.id }
    }
  }
}
