import type { ICheckoutProvider, ProviderCapabilities } from "../../../payments/provider"
import {
  CheckoutErrorCode,
  type SessionRecord,
  type SessionStatus,
} from "../../../payments/types"
import { DummyCheckoutProvider } from "../../integrations/checkout-providers"
import { runBulkAction, type BulkActionResult } from "./bulk-actions"
import { CheckoutDispatcher, type CheckoutRequest } from "./checkout-dispatcher"
import type { CheckoutConfig } from "./config"
import { ConfigurationError } from "./errors"
import { ModelRegistry, type ModelRef } from "./model-registry"
import { PgSessionModel, type PgConnectionLike } from "./pg-session-model"
import { CheckoutProviderRouter } from "./provider-router"
import { syncStaleSessions, type StaleSyncResult } from "./reconciliation"
import { collectSessions, SessionStoreRouter } from "./session-store-router"
import {
  StateSyncEngine,
  type SessionAction,
  type SessionActionOptions,
  type TransitionOutcome,
} from "./state-sync"
import { processCheckoutWebhook, type ProcessWebhookResult } from "./webhook-pipeline"
import {
  InMemoryWebhookEventRepository,
  PgWebhookEventRepository,
  type WebhookEventRepository,
} from "./webhook-event-repository"
import { resolveHeader, type HeaderBag } from "./webhook-verifier"

export type CheckoutSessionServiceDeps = {
  config: CheckoutConfig
  providers: CheckoutProviderRouter
  store: SessionStoreRouter
  webhook_events: WebhookEventRepository
  scopeOrLogger?: unknown
}

export type ProviderSummary = {
  key: string
  is_default: boolean
  capabilities: ProviderCapabilities
}

export type ProviderUsage = ProviderSummary & {
  registered: boolean
  session_count: number
}

export const CHECKOUT_SUCCESS_PATH = "/store/checkout/success"
export const CHECKOUT_CANCEL_PATH = "/store/checkout/cancel"

export type ListSessionsInput = {
  model?: ModelRef
  limit?: number
}

/**
 * Entry point for routes and jobs. Wires the dispatcher, the state sync
 * engine and the webhook pipeline over one provider router and one store.
 */
export class CheckoutSessionService {
  readonly config: CheckoutConfig
  readonly providers: CheckoutProviderRouter
  readonly store: SessionStoreRouter
  readonly engine: StateSyncEngine
  private readonly dispatcher: CheckoutDispatcher
  private readonly webhookEvents: WebhookEventRepository
  private readonly scopeOrLogger?: unknown

  constructor(deps: CheckoutSessionServiceDeps) {
    this.config = deps.config
    this.providers = deps.providers
    this.store = deps.store
    this.webhookEvents = deps.webhook_events
    this.scopeOrLogger = deps.scopeOrLogger
    this.dispatcher = new CheckoutDispatcher(this.providers, this.store, this.scopeOrLogger)
    this.engine = new StateSyncEngine(this.providers, this.store, {
      scopeOrLogger: this.scopeOrLogger,
    })
  }

  /**
   * Return urls the caller leaves out point at this app's landing routes
   * when `CHECKOUT_RETURN_BASE_URL` is set.
   */
  createCheckout(
    request: CheckoutRequest,
    options: { model?: ModelRef; correlation_id?: string } = {}
  ): Promise<SessionRecord> {
    const base = this.config.return_base_url

    return this.dispatcher.createCheckout(
      base
        ? {
            ...request,
            success_url: request.success_url ?? `${base}${CHECKOUT_SUCCESS_PATH}`,
            cancel_url: request.cancel_url ?? `${base}${CHECKOUT_CANCEL_PATH}`,
          }
        : request,
      options
    )
  }

  /** Stored session or null, for the landing routes. */
  async findSession(paymentId: string, model?: ModelRef): Promise<SessionRecord | null> {
    if (!paymentId.trim()) {
      return null
    }

    const found = await this.store.find(paymentId.trim(), model)
    return found?.record ?? null
  }

  getSession(paymentId: string, model?: ModelRef): Promise<SessionRecord> {
    return this.store.get(paymentId, model)
  }

  applyWebhook(input: {
    raw_body: Buffer | string
    headers: HeaderBag
    correlation_id?: string
  }): Promise<ProcessWebhookResult> {
    return processCheckoutWebhook({
      raw_body: input.raw_body,
      signature: resolveHeader(input.headers, this.config.signature_header),
      secret: this.config.webhook_secret,
      repository: this.webhookEvents,
      engine: this.engine,
      correlation_id: input.correlation_id,
      scopeOrLogger: this.scopeOrLogger,
    })
  }

  refundSession(paymentId: string, options?: SessionActionOptions): Promise<TransitionOutcome> {
    return this.engine.refund(paymentId, options)
  }

  cancelSession(paymentId: string, options?: SessionActionOptions): Promise<TransitionOutcome> {
    return this.engine.cancel(paymentId, options)
  }

  syncSession(paymentId: string, options?: SessionActionOptions): Promise<TransitionOutcome> {
    return this.engine.sync(paymentId, options)
  }

  /**
   * Operator override of the stored status. It still goes through the
   * state machine, so a settled session cannot be moved back.
   */
  updateSessionStatus(
    paymentId: string,
    status: SessionStatus,
    options: SessionActionOptions = {}
  ): Promise<TransitionOutcome> {
    return this.engine.applyTransition({
      payment_id: paymentId,
      target: status,
      source: "manual",
      model: options.model,
      correlation_id: options.correlation_id,
    })
  }

  performAction(
    action: SessionAction,
    paymentId: string,
    options?: SessionActionOptions
  ): Promise<TransitionOutcome> {
    return this.engine.perform(action, paymentId, options)
  }

  allSessions(model?: ModelRef): AsyncIterable<SessionRecord> {
    return this.store.all(model)
  }

  listSessions(input: ListSessionsInput = {}): Promise<SessionRecord[]> {
    return collectSessions(this.store.all(input.model), input.limit)
  }

  listProviders(): ProviderSummary[] {
    const defaultKey = this.providers.defaultKey()

    return this.providers.listKeys().flatMap((key) => {
      const provider = this.providers.get(key)
      if (!provider) {
        return []
      }

      return [
        {
          key,
          is_default: key === defaultKey,
          capabilities: provider.getCapabilities(),
        },
      ]
    })
  }

  /**
   * Registered providers with their stored session counts. Keys that only
   * appear on stored sessions are listed after them as unregistered.
   */
  async listProviderUsage(model?: ModelRef): Promise<ProviderUsage[]> {
    const counts = new Map<string, number>()
    for await (const session of this.store.all(model)) {
      counts.set(session.provider_key, (counts.get(session.provider_key) ?? 0) + 1)
    }

    const registered: ProviderUsage[] = this.listProviders().map((summary) => ({
      ...summary,
      registered: true,
      session_count: counts.get(summary.key) ?? 0,
    }))
    const known = new Set(registered.map((entry) => entry.key))
    const orphaned: ProviderUsage[] = Array.from(counts)
      .filter(([key]) => !known.has(key))
      .sort(([left], [right]) => left.localeCompare(right))
      .map(([key, count]) => ({
        key,
        is_default: false,
        capabilities: { supportsRefunds: false, supportsCancel: false, supportsWebhooks: false },
        registered: false,
        session_count: count,
      }))

    return [...registered, ...orphaned]
  }

  listModels(): string[] {
    return this.store.models().map((model) => model.name)
  }

  runBulkAction(
    action: SessionAction,
    paymentIds: readonly string[],
    options: SessionActionOptions = {}
  ): Promise<BulkActionResult> {
    return runBulkAction({
      engine: this.engine,
      action,
      payment_ids: paymentIds,
      model: options.model,
      correlation_id: options.correlation_id,
      scopeOrLogger: this.scopeOrLogger,
    })
  }

  syncStaleSessions(
    input: { now_ms?: number; model?: ModelRef; correlation_id?: string } = {}
  ): Promise<StaleSyncResult> {
    return syncStaleSessions({
      store: this.store,
      engine: this.engine,
      now_ms: input.now_ms,
      stale_minutes: this.config.sync_stale_minutes,
      max_sessions: this.config.sync_max_sessions,
      model: input.model,
      correlation_id: input.correlation_id,
      scopeOrLogger: this.scopeOrLogger,
    })
  }
}

export function createCheckoutSessionService(input: {
  config: CheckoutConfig
  pg?: PgConnectionLike | null
  providers?: Iterable<ICheckoutProvider>
  scopeOrLogger?: unknown
}): CheckoutSessionService {
  const { config } = input
  const pg = input.pg ?? null

  const providers = new CheckoutProviderRouter({
    default_provider: config.default_provider,
    timeout_ms: config.provider_timeout_ms,
    scopeOrLogger: input.scopeOrLogger,
  })
  if (config.dummy_provider_enabled) {
    providers.register(new DummyCheckoutProvider())
  }
  for (const provider of input.providers ?? []) {
    providers.register(provider)
  }

  if (config.session_tables.length && !pg) {
    throw new ConfigurationError(
      "CHECKOUT_SESSION_TABLES needs a database connection.",
      {
        code: CheckoutErrorCode.CHECKOUT_CONFIG_INVALID,
        httpStatus: 500,
        details: { tables: config.session_tables },
      }
    )
  }

  const registry = new ModelRegistry(
    pg ? config.session_tables.map((table) => new PgSessionModel(pg, { table })) : []
  )

  return new CheckoutSessionService({
    config,
    providers,
    store: new SessionStoreRouter({ registry, scopeOrLogger: input.scopeOrLogger }),
    webhook_events: pg
      ? new PgWebhookEventRepository(pg)
      : new InMemoryWebhookEventRepository(),
    scopeOrLogger: input.scopeOrLogger,
  })
}
