import crypto from "crypto"
import {
  notSupportedResult,
  parseCreateCheckoutInput,
  sessionActionInputSchema,
  type CreateCheckoutInput,
  type CreateCheckoutOutput,
  type ICheckoutProvider,
  type ProviderCapabilities,
  type ProviderResult,
  type SessionActionInput,
  type SessionOperationOutput,
} from "../../../payments/provider"
import { CheckoutErrorCode } from "../../../payments/types"

export const DUMMY_PROVIDER_KEY = "dummy"
const DUMMY_BASE_URL = "https://dummy-checkout.local"
export const DEFAULT_DUMMY_TRACKED_ENTRIES = 1000

type DummyMethod = "create_checkout" | "refund" | "cancel" | "fetch_status"

export type DummyCheckoutProviderOptions = {
  key?: string
  /** Status every fetch reports, unless overridden per payment. */
  always_status?: string
  capabilities?: Partial<ProviderCapabilities>
  base_url?: string
  /** How many calls and remote statuses are kept; the oldest go first. */
  max_tracked?: number
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

/**
 * In-process provider for local runs and tests. It never leaves the
 * process; remote state is a map the test can steer.
 */
export class DummyCheckoutProvider implements ICheckoutProvider {
  readonly key: string

  private readonly alwaysStatus: string | null
  private readonly capabilities: ProviderCapabilities
  private readonly baseUrl: string
  private readonly maxTracked: number
  private readonly remoteStatus = new Map<string, string>()
  private readonly failures = new Map<DummyMethod, string>()
  private readonly calls: Array<{ method: DummyMethod; payment_id: string | null }> = []
  private sequence = 0

  constructor(options: DummyCheckoutProviderOptions = {}) {
    this.key = readText(options.key) || DUMMY_PROVIDER_KEY
    this.alwaysStatus = readText(options.always_status) || null
    this.baseUrl = readText(options.base_url) || DUMMY_BASE_URL
    this.maxTracked = Math.max(
      1,
      Math.floor(options.max_tracked ?? DEFAULT_DUMMY_TRACKED_ENTRIES)
    )
    this.capabilities = {
      supportsRefunds: options.capabilities?.supportsRefunds ?? true,
      supportsCancel: options.capabilities?.supportsCancel ?? true,
      supportsWebhooks: options.capabilities?.supportsWebhooks ?? true,
    }
  }

  /** Sets what the "remote" side reports for one payment. */
  setRemoteStatus(paymentId: string, status: string): void {
    this.trackStatus(paymentId, status)
  }

  /** Makes every later call of `method` fail until cleared. */
  failWith(method: DummyMethod, message: string | null): void {
    if (message === null) {
      this.failures.delete(method)
      return
    }

    this.failures.set(method, message)
  }

  /** Calls of `method` among the most recent `max_tracked` calls. */
  callsTo(method: DummyMethod): number {
    return this.calls.filter((call) => call.method === method).length
  }

  get trackedPayments(): number {
    return this.remoteStatus.size
  }

  async createCheckout(
    input: CreateCheckoutInput
  ): Promise<ProviderResult<CreateCheckoutOutput>> {
    const valid = parseCreateCheckoutInput(input)
    const failure = this.record("create_checkout", null, valid.correlation_id)
    if (failure) {
      return failure
    }

    this.sequence += 1
    const token = crypto.randomBytes(6).toString("hex")
    const paymentId = `${this.key}_pay_${this.sequence}_${token}`
    const status = "pending"
    this.trackStatus(paymentId, status)

    return {
      ok: true,
      data: {
        payment_id: paymentId,
        status,
        redirect_url: `${this.baseUrl}/pay/${paymentId}`,
        raw_payload: {
          id: paymentId,
          status,
          amount: valid.amount,
          currency: valid.currency,
          metadata: valid.metadata,
          success_url: valid.success_url ?? null,
          cancel_url: valid.cancel_url ?? null,
        },
      },
    }
  }

  async refund(input: SessionActionInput): Promise<ProviderResult<SessionOperationOutput>> {
    const valid = sessionActionInputSchema.parse(input)
    if (!this.capabilities.supportsRefunds) {
      return notSupportedResult({
        message: `${this.key} does not support refunds.`,
        correlation_id: valid.correlation_id,
      })
    }

    return this.settle("refund", valid, "refunded")
  }

  async cancel(input: SessionActionInput): Promise<ProviderResult<SessionOperationOutput>> {
    const valid = sessionActionInputSchema.parse(input)
    if (!this.capabilities.supportsCancel) {
      return notSupportedResult({
        message: `${this.key} does not support cancellation.`,
        correlation_id: valid.correlation_id,
      })
    }

    return this.settle("cancel", valid, "cancelled")
  }

  async fetchStatus(
    input: SessionActionInput
  ): Promise<ProviderResult<SessionOperationOutput>> {
    const valid = sessionActionInputSchema.parse(input)
    const failure = this.record("fetch_status", valid.payment_id, valid.correlation_id)
    if (failure) {
      return failure
    }

    const status =
      this.remoteStatus.get(valid.payment_id) ?? this.alwaysStatus ?? "pending"

    return {
      ok: true,
      data: {
        status,
        raw_payload: {
          id: valid.payment_id,
          status,
        },
      },
    }
  }

  getCapabilities(): ProviderCapabilities {
    return { ...this.capabilities }
  }

  private settle(
    method: "refund" | "cancel",
    input: SessionActionInput,
    status: string
  ): ProviderResult<SessionOperationOutput> {
    const failure = this.record(method, input.payment_id, input.correlation_id)
    if (failure) {
      return failure
    }

    this.trackStatus(input.payment_id, status)
    return {
      ok: true,
      data: {
        status,
        raw_payload: {
          id: input.payment_id,
          status,
          amount: input.amount,
          currency: input.currency,
        },
      },
    }
  }

  private record(
    method: DummyMethod,
    paymentId: string | null,
    correlationId: string
  ): ProviderResult<never> | null {
    this.calls.push({ method, payment_id: paymentId })
    if (this.calls.length > this.maxTracked) {
      this.calls.splice(0, this.calls.length - this.maxTracked)
    }

    const message = this.failures.get(method)
    if (!message) {
      return null
    }

    return {
      ok: false,
      error: {
        code: CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED,
        message,
        details: { method, payment_id: paymentId },
        correlation_id: correlationId,
      },
    }
  }

  private trackStatus(paymentId: string, status: string): void {
    this.remoteStatus.delete(paymentId)
    this.remoteStatus.set(paymentId, status)
    for (const oldest of this.remoteStatus.keys()) {
      if (this.remoteStatus.size <= this.maxTracked) {
        break
      }
      this.remoteStatus.delete(oldest)
    }
  }
}
