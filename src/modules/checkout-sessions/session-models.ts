import type { SessionRecord, SessionStatus } from "../../../payments/types"
import { DuplicateSessionError } from "./errors"

/**
 * One independently-typed session store. The router treats every model
 * the same way; only the model itself knows how records are kept.
 */
export interface SessionStorageModel {
  readonly name: string

  insert(record: SessionRecord): Promise<void>

  findByPaymentId(paymentId: string): Promise<SessionRecord | null>

  /**
   * Compare-and-set write. Resolves false when the stored status is no
   * longer `expectedStatus` or the record is gone.
   */
  replace(record: SessionRecord, expectedStatus: SessionStatus): Promise<boolean>

  /** Records in `created_at` order. Each call starts a fresh pass. */
  scan(): AsyncIterable<SessionRecord>
}

function cloneRecord(record: SessionRecord): SessionRecord {
  return structuredClone(record)
}

export class InMemorySessionModel implements SessionStorageModel {
  private readonly records = new Map<string, SessionRecord>()

  constructor(readonly name: string) {}

  get size(): number {
    return this.records.size
  }

  async insert(record: SessionRecord): Promise<void> {
    if (this.records.has(record.payment_id)) {
      throw new DuplicateSessionError(record.payment_id, this.name)
    }

    this.records.set(record.payment_id, cloneRecord(record))
  }

  async findByPaymentId(paymentId: string): Promise<SessionRecord | null> {
    const record = this.records.get(paymentId)
    return record ? cloneRecord(record) : null
  }

  async replace(record: SessionRecord, expectedStatus: SessionStatus): Promise<boolean> {
    const stored = this.records.get(record.payment_id)
    if (!stored || stored.status !== expectedStatus) {
      return false
    }

    this.records.set(record.payment_id, cloneRecord(record))
    return true
  }

  async *scan(): AsyncIterable<SessionRecord> {
    // Array#sort is stable, so equal timestamps keep insertion order.
    const snapshot = Array.from(this.records.values()).sort((left, right) =>
      left.created_at.localeCompare(right.created_at)
    )

    for (const record of snapshot) {
      yield cloneRecord(record)
    }
  }
}
