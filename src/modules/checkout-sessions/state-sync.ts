import { recordTransitionMetric } from "../../../payments/observability"
import { sessionOperationOutputSchema, type ICheckoutProvider } from "../../../payments/provider"
import {
  logIgnoredTransition,
  logSessionStateChange,
} from "../../../payments/stateMachine"
import {
  SessionStatus,
  type SessionRecord,
  type TransitionSource,
} from "../../../payments/types"
import { resolveCorrelationId } from "../logging/correlation"
import type { ModelRef } from "./model-registry"
import type { CheckoutProviderRouter, ProviderMethod } from "./provider-router"
import type {
  SessionMutator,
  SessionStoreRouter,
  SessionUpdateResult,
} from "./session-store-router"
import {
  isSessionTransitionAllowed,
  mapProviderStatus,
  transitionSessionStatus,
} from "./state-machine"

export const SessionAction = {
  REFUND: "refund",
  CANCEL: "cancel",
  SYNC: "sync",
} as const

export type SessionAction = (typeof SessionAction)[keyof typeof SessionAction]

export type ApplySessionTransitionInput = {
  payment_id: string
  target: SessionStatus
  source: TransitionSource
  raw_payload?: Record<string, unknown>
  model?: ModelRef
  correlation_id?: string
}

export type TransitionOutcome = {
  session: SessionRecord
  from: SessionStatus
  requested: SessionStatus
  applied: boolean
  idempotent: boolean
  model: string
}

export type SessionActionOptions = {
  model?: ModelRef
  correlation_id?: string
}

export type SyncSessionOptions = SessionActionOptions & {
  source?: Extract<TransitionSource, "sync" | "reconcile">
}

type SessionWrite = (mutator: SessionMutator) => Promise<SessionUpdateResult>

type StateSyncEngineOptions = {
  now?: () => Date
  scopeOrLogger?: unknown
}

const ACTION_TARGETS = {
  [SessionAction.REFUND]: SessionStatus.REFUNDED,
  [SessionAction.CANCEL]: SessionStatus.CANCELLED,
} as const

/**
 * The only writer of session status. Rejected transitions are no-ops for
 * the caller and leave an audit log line behind.
 */
export class StateSyncEngine {
  private readonly now: () => Date
  private readonly scopeOrLogger?: unknown

  constructor(
    private readonly providers: CheckoutProviderRouter,
    private readonly store: SessionStoreRouter,
    options: StateSyncEngineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
    this.scopeOrLogger = options.scopeOrLogger
  }

  async applyTransition(input: ApplySessionTransitionInput): Promise<TransitionOutcome> {
    return this.writeTransition(input, (mutator) =>
      this.store.update(input.payment_id, mutator, input.model)
    )
  }

  private async writeTransition(
    input: ApplySessionTransitionInput,
    write: SessionWrite
  ): Promise<TransitionOutcome> {
    const correlationId = resolveCorrelationId(input.correlation_id)
    let from: SessionStatus = input.target
    let idempotent = false

    const result = await write((current) => {
      const transition = transitionSessionStatus({
        current: current.status,
        next: input.target,
        correlation_id: correlationId,
        on_invalid: "noop",
      })
      from = current.status
      idempotent = transition.idempotent

      if (!transition.changed) {
        return null
      }

      return {
        ...current,
        status: transition.next,
        raw_provider_payload: input.raw_payload ?? current.raw_provider_payload,
        updated_at: this.now().toISOString(),
      }
    })

    const session = result.record
    if (result.changed) {
      logSessionStateChange({
        payment_id: session.payment_id,
        provider_key: session.provider_key,
        from,
        to: session.status,
        source: input.source,
        correlation_id: correlationId,
        scopeOrLogger: this.scopeOrLogger,
      })
    } else if (!idempotent) {
      logIgnoredTransition({
        payment_id: session.payment_id,
        provider_key: session.provider_key,
        from,
        requested: input.target,
        source: input.source,
        correlation_id: correlationId,
        scopeOrLogger: this.scopeOrLogger,
      })
    }

    recordTransitionMetric({
      provider: session.provider_key,
      from,
      to: input.target,
      source: input.source,
      applied: result.changed,
    })

    return {
      session,
      from,
      requested: input.target,
      applied: result.changed,
      idempotent,
      model: result.model,
    }
  }

  /** Pulls the live status from the owning provider and applies it. */
  async sync(paymentId: string, options: SyncSessionOptions = {}): Promise<TransitionOutcome> {
    const correlationId = resolveCorrelationId(options.correlation_id)
    const session = await this.store.get(paymentId, options.model)
    const provider = this.providers.resolve(session.provider_key, {
      correlation_id: correlationId,
      payment_id: session.payment_id,
    })

    const remote = await this.callProvider(provider, "fetch_status", session, correlationId)

    return this.applyTransition({
      payment_id: session.payment_id,
      target: mapProviderStatus(remote.status),
      raw_payload: remote.raw_payload,
      source: options.source ?? "sync",
      model: options.model,
      correlation_id: correlationId,
    })
  }

  async refund(paymentId: string, options: SessionActionOptions = {}): Promise<TransitionOutcome> {
    return this.runProviderAction(SessionAction.REFUND, paymentId, options)
  }

  async cancel(paymentId: string, options: SessionActionOptions = {}): Promise<TransitionOutcome> {
    return this.runProviderAction(SessionAction.CANCEL, paymentId, options)
  }

  async perform(
    action: SessionAction,
    paymentId: string,
    options: SessionActionOptions = {}
  ): Promise<TransitionOutcome> {
    if (action === SessionAction.SYNC) {
      return this.sync(paymentId, options)
    }

    return this.runProviderAction(action, paymentId, options)
  }

  private async runProviderAction(
    action: typeof SessionAction.REFUND | typeof SessionAction.CANCEL,
    paymentId: string,
    options: SessionActionOptions
  ): Promise<TransitionOutcome> {
    const correlationId = resolveCorrelationId(options.correlation_id)
    const target = ACTION_TARGETS[action]

    // Read, provider call and write share one critical section, so a
    // concurrent request sees the settled status instead of calling again.
    return this.store.withLock(paymentId, async (writer) => {
      const session = await this.store.get(paymentId, options.model)
      const input: ApplySessionTransitionInput = {
        payment_id: session.payment_id,
        target,
        source: action,
        model: options.model,
        correlation_id: correlationId,
      }
      const write: SessionWrite = (mutator) => writer.update(mutator, options.model)

      if (session.status === target || !isSessionTransitionAllowed(session.status, target)) {
        return this.writeTransition(input, write)
      }

      const provider = this.providers.resolve(session.provider_key, {
        correlation_id: correlationId,
        payment_id: session.payment_id,
      })
      const remote = await this.callProvider(provider, action, session, correlationId)

      return this.writeTransition({ ...input, raw_payload: remote.raw_payload }, write)
    })
  }

  private async callProvider(
    provider: ICheckoutProvider,
    method: Extract<ProviderMethod, "refund" | "cancel" | "fetch_status">,
    session: SessionRecord,
    correlationId: string
  ) {
    const input = {
      payment_id: session.payment_id,
      amount: session.amount,
      currency: session.currency,
      correlation_id: correlationId,
    }

    return this.providers.call(
      provider,
      method,
      { correlation_id: correlationId, payment_id: session.payment_id },
      (selected) => {
        if (method === "refund") {
          return selected.refund(input)
        }
        if (method === "cancel") {
          return selected.cancel(input)
        }
        return selected.fetchStatus(input)
      },
      sessionOperationOutputSchema
    )
  }
}
