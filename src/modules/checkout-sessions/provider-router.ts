import { setTimeout as delay } from "timers/promises"
import type { z, ZodTypeAny } from "zod"
import { logProviderCall } from "../../../payments/observability"
import type { ICheckoutProvider, ProviderResult } from "../../../payments/provider"
import { CheckoutErrorCode } from "../../../payments/types"
import { logEvent } from "../logging/log-event"
import { ConfigurationError, ProviderError, UnknownProviderError } from "./errors"

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000

export type ProviderMethod = "create_checkout" | "refund" | "cancel" | "fetch_status"

export type CheckoutProviderRouterOptions = {
  providers?: Iterable<ICheckoutProvider>
  default_provider?: string | null
  timeout_ms?: number
  scopeOrLogger?: unknown
}

type CallContext = {
  correlation_id: string
  payment_id?: string
}

const TIMED_OUT = Symbol("provider_call_timed_out")

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function normalizeKey(value: unknown): string {
  return readText(value).toLowerCase()
}

/**
 * Keyed set of checkout providers. Every call into a provider goes through
 * `call`, which applies the timeout, logs the call and turns any failure
 * into a ProviderError.
 */
export class CheckoutProviderRouter {
  private readonly providers = new Map<string, ICheckoutProvider>()
  private readonly defaultProvider: string
  private readonly timeoutMs: number
  private readonly scopeOrLogger?: unknown

  constructor(options: CheckoutProviderRouterOptions = {}) {
    this.defaultProvider = normalizeKey(options.default_provider)
    this.timeoutMs = Math.max(1, Math.floor(options.timeout_ms ?? DEFAULT_PROVIDER_TIMEOUT_MS))
    this.scopeOrLogger = options.scopeOrLogger

    for (const provider of options.providers ?? []) {
      this.register(provider)
    }
  }

  register(provider: ICheckoutProvider): this {
    const key = normalizeKey(provider.key)
    if (!key) {
      throw new ConfigurationError("Checkout provider key is required.", {
        code: CheckoutErrorCode.CHECKOUT_CONFIG_INVALID,
        httpStatus: 500,
      })
    }

    const existing = this.providers.get(key)
    if (existing === provider) {
      return this
    }
    if (existing) {
      throw new ConfigurationError(`Checkout provider key is already taken: ${key}`, {
        code: CheckoutErrorCode.CHECKOUT_CONFIG_INVALID,
        httpStatus: 500,
        details: { provider_key: key },
      })
    }

    this.providers.set(key, provider)
    return this
  }

  has(key: string): boolean {
    return this.providers.has(normalizeKey(key))
  }

  listKeys(): string[] {
    return Array.from(this.providers.keys())
  }

  get size(): number {
    return this.providers.size
  }

  /** The key `resolve()` picks when none is given, if it is registered. */
  defaultKey(): string | null {
    const key = this.defaultProvider || this.listKeys()[0] || ""
    return this.providers.has(key) ? key : null
  }

  get(key: string): ICheckoutProvider | null {
    return this.providers.get(normalizeKey(key)) ?? null
  }

  /**
   * Without a key: the configured default provider, else the first one
   * registered.
   */
  resolve(key?: string | null, context: Partial<CallContext> = {}): ICheckoutProvider {
    const requested = normalizeKey(key)
    const selectedKey = requested || this.defaultProvider || this.listKeys()[0] || ""
    const provider = selectedKey ? this.providers.get(selectedKey) : undefined

    if (!provider) {
      throw new UnknownProviderError(selectedKey || null, {
        details: { registered: this.listKeys() },
      })
    }

    logEvent(
      "CHECKOUT_PROVIDER_SELECTED",
      {
        requested: requested || null,
        defaulted: !requested,
      },
      context.correlation_id,
      {
        level: "debug",
        scopeOrLogger: this.scopeOrLogger,
        fields: {
          provider_key: selectedKey,
          payment_id: context.payment_id,
        },
      }
    )

    return provider
  }

  async call<TSchema extends ZodTypeAny>(
    provider: ICheckoutProvider,
    method: ProviderMethod,
    context: CallContext,
    invoke: (provider: ICheckoutProvider) => Promise<ProviderResult<unknown>>,
    schema: TSchema
  ): Promise<z.output<TSchema>> {
    const providerKey = normalizeKey(provider.key)
    const startedAt = Date.now()
    const controller = new AbortController()

    const finish = (success: boolean, errorCode?: string): void => {
      logProviderCall(
        {
          provider: providerKey,
          method,
          duration_ms: Date.now() - startedAt,
          success,
          error_code: errorCode ?? null,
          correlation_id: context.correlation_id,
          payment_id: context.payment_id,
        },
        { scopeOrLogger: this.scopeOrLogger }
      )
    }

    let outcome: ProviderResult<unknown> | typeof TIMED_OUT
    try {
      outcome = await Promise.race([
        Promise.resolve().then(() => invoke(provider)),
        delay<typeof TIMED_OUT>(this.timeoutMs, TIMED_OUT, { signal: controller.signal }),
      ])
    } catch (error) {
      finish(false, CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED)
      throw new ProviderError({
        message: `Checkout provider ${providerKey} failed during ${method}.`,
        provider_key: providerKey,
        method,
        details: { payment_id: context.payment_id ?? null },
        cause: error,
      })
    } finally {
      controller.abort()
    }

    if (outcome === TIMED_OUT) {
      finish(false, CheckoutErrorCode.CHECKOUT_PROVIDER_TIMEOUT)
      throw new ProviderError({
        code: CheckoutErrorCode.CHECKOUT_PROVIDER_TIMEOUT,
        message: `Checkout provider ${providerKey} did not answer ${method} within ${this.timeoutMs}ms.`,
        provider_key: providerKey,
        method,
        details: { timeout_ms: this.timeoutMs, payment_id: context.payment_id ?? null },
      })
    }

    if (!outcome.ok) {
      finish(false, outcome.error.code)
      throw new ProviderError({
        message: outcome.error.message,
        provider_key: providerKey,
        method,
        details: {
          provider_error_code: outcome.error.code,
          provider_details: outcome.error.details,
          payment_id: context.payment_id ?? null,
        },
      })
    }

    const parsed = schema.safeParse(outcome.data)
    if (!parsed.success) {
      finish(false, CheckoutErrorCode.CHECKOUT_PROVIDER_INVALID_RESPONSE)
      throw new ProviderError({
        code: CheckoutErrorCode.CHECKOUT_PROVIDER_INVALID_RESPONSE,
        message: `Checkout provider ${providerKey} returned an invalid ${method} response.`,
        provider_key: providerKey,
        method,
        details: { issues: parsed.error.issues.map((issue) => issue.message) },
        cause: parsed.error,
      })
    }

    finish(true)
    return parsed.data
  }
}
