import { randomUUID } from "node:crypto"
import type { SessionRecord } from "../../../payments/types"
import { logEvent } from "../logging/log-event"
import { ConcurrentUpdateError, ConfigurationError, DuplicateSessionError, NotFoundError } from "./errors"
import { KeyedLock } from "./keyed-lock"
import { ModelRegistry, type ModelRef } from "./model-registry"
import { InMemorySessionModel, type SessionStorageModel } from "./session-models"

export const FALLBACK_MODEL_NAME = "default"
const DEFAULT_MAX_UPDATE_ATTEMPTS = 3

export type NewSessionInput = Omit<SessionRecord, "id" | "created_at" | "updated_at"> & {
  created_at?: string
}

export type SessionMutator = (
  current: SessionRecord
) => SessionRecord | null | Promise<SessionRecord | null>

export type FoundSession = {
  record: SessionRecord
  model: SessionStorageModel
}

export type SessionUpdateResult = {
  previous: SessionRecord
  record: SessionRecord
  changed: boolean
  model: string
}

/** Writes available to a task that already holds a payment's lock. */
export type LockedSessionWriter = {
  update(mutator: SessionMutator, model?: ModelRef): Promise<SessionUpdateResult>
}

export type SessionStoreRouterOptions = {
  registry?: ModelRegistry
  now?: () => Date
  max_update_attempts?: number
  scopeOrLogger?: unknown
}

/**
 * One logical session namespace over every registered model. With no
 * registered model it keeps sessions in a process-local fallback model.
 */
export class SessionStoreRouter {
  readonly registry: ModelRegistry
  private readonly lock = new KeyedLock()
  private readonly now: () => Date
  private readonly maxUpdateAttempts: number
  private readonly scopeOrLogger?: unknown
  private fallback: InMemorySessionModel | null = null

  constructor(options: SessionStoreRouterOptions = {}) {
    this.registry = options.registry ?? new ModelRegistry()
    this.now = options.now ?? (() => new Date())
    this.maxUpdateAttempts = Math.max(
      1,
      Math.floor(options.max_update_attempts ?? DEFAULT_MAX_UPDATE_ATTEMPTS)
    )
    this.scopeOrLogger = options.scopeOrLogger
  }

  /** Models in search order, including the fallback when nothing is registered. */
  models(): readonly SessionStorageModel[] {
    if (this.registry.size > 0) {
      return this.registry.list()
    }

    return [this.getFallback()]
  }

  resolveModel(ref: ModelRef): SessionStorageModel {
    if (this.registry.size === 0) {
      const fallback = this.getFallback()
      if (ref === fallback || ref === FALLBACK_MODEL_NAME) {
        return fallback
      }
    }

    return this.registry.resolve(ref)
  }

  async create(input: NewSessionInput, model?: ModelRef): Promise<SessionRecord> {
    const target = model !== undefined ? this.resolveModel(model) : this.models()[0]
    if (!target) {
      throw new ConfigurationError("No session model is available.")
    }

    const paymentId = input.payment_id.trim()

    return this.lock.run(paymentId, async () => {
      const existing = await this.find(paymentId)
      if (existing) {
        throw new DuplicateSessionError(paymentId, existing.model.name)
      }

      const timestamp = input.created_at ?? this.now().toISOString()
      const record: SessionRecord = {
        ...input,
        id: randomUUID(),
        payment_id: paymentId,
        created_at: timestamp,
        updated_at: timestamp,
      }

      await target.insert(record)
      return record
    })
  }

  async find(paymentId: string, model?: ModelRef): Promise<FoundSession | null> {
    const candidates = model !== undefined ? [this.resolveModel(model)] : this.models()

    for (const candidate of candidates) {
      const record = await candidate.findByPaymentId(paymentId)
      if (record) {
        return { record, model: candidate }
      }
    }

    return null
  }

  async get(paymentId: string, model?: ModelRef): Promise<SessionRecord> {
    const found = await this.find(paymentId, model)
    if (!found) {
      throw new NotFoundError(paymentId)
    }

    return found.record
  }

  /**
   * Runs `mutator` against the current record under the per-payment lock.
   * A null result means no change. Lost compare-and-set races re-read and
   * re-run the mutator.
   */
  async update(
    paymentId: string,
    mutator: SessionMutator,
    model?: ModelRef
  ): Promise<SessionUpdateResult> {
    return this.lock.run(paymentId, () => this.updateHeld(paymentId, mutator, model))
  }

  /**
   * Holds the payment's lock for the whole of `task`. Writes made inside it
   * go through the writer it receives; calling `update` or `withLock` for
   * the same payment from inside the task would wait on itself.
   */
  async withLock<T>(
    paymentId: string,
    task: (writer: LockedSessionWriter) => Promise<T>
  ): Promise<T> {
    return this.lock.run(paymentId, () =>
      task({
        update: (mutator, model) => this.updateHeld(paymentId, mutator, model),
      })
    )
  }

  private async updateHeld(
    paymentId: string,
    mutator: SessionMutator,
    model?: ModelRef
  ): Promise<SessionUpdateResult> {
    for (let attempt = 1; attempt <= this.maxUpdateAttempts; attempt += 1) {
      const found = await this.find(paymentId, model)
      if (!found) {
        throw new NotFoundError(paymentId)
      }

      const previous = found.record
      const next = await mutator(structuredClone(previous))
      if (!next) {
        return {
          previous,
          record: previous,
          changed: false,
          model: found.model.name,
        }
      }

      const record: SessionRecord = {
        ...next,
        id: previous.id,
        payment_id: previous.payment_id,
        provider_key: previous.provider_key,
        amount: previous.amount,
        currency: previous.currency,
        created_at: previous.created_at,
      }

      if (await found.model.replace(record, previous.status)) {
        return {
          previous,
          record,
          changed: true,
          model: found.model.name,
        }
      }

      logEvent(
        "CHECKOUT_SESSION_UPDATE_CONFLICT",
        { attempt, max_attempts: this.maxUpdateAttempts },
        undefined,
        {
          level: "warn",
          scopeOrLogger: this.scopeOrLogger,
          fields: {
            payment_id: paymentId,
            model: found.model.name,
          },
        }
      )
    }

    throw new ConcurrentUpdateError(paymentId, this.maxUpdateAttempts)
  }

  /**
   * Every session, model by model in registration order, or one model's
   * sessions. The result can be iterated more than once.
   */
  all(model?: ModelRef): AsyncIterable<SessionRecord> {
    const sources = model !== undefined ? [this.resolveModel(model)] : this.models()

    return {
      [Symbol.asyncIterator]: () => iterateModels(sources),
    }
  }

  private getFallback(): InMemorySessionModel {
    if (!this.fallback) {
      this.fallback = new InMemorySessionModel(FALLBACK_MODEL_NAME)
    }

    return this.fallback
  }
}

async function* iterateModels(
  sources: readonly SessionStorageModel[]
): AsyncGenerator<SessionRecord> {
  for (const source of sources) {
    yield* source.scan()
  }
}

export async function collectSessions(
  sessions: AsyncIterable<SessionRecord>,
  limit = Number.POSITIVE_INFINITY
): Promise<SessionRecord[]> {
  const collected: SessionRecord[] = []
  if (limit <= 0) {
    return collected
  }

  for await (const session of sessions) {
    collected.push(session)
    if (collected.length >= limit) {
      break
    }
  }

  return collected
}
