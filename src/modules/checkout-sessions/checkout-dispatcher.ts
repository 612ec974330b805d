import { z } from "zod"
import {
  createCheckoutOutputSchema,
  parseCreateCheckoutInput,
} from "../../../payments/provider"
import { SessionStatus, type SessionRecord } from "../../../payments/types"
import { resolveCorrelationId } from "../logging/correlation"
import { logEvent } from "../logging/log-event"
import { CheckoutInputError } from "./errors"
import type { ModelRef } from "./model-registry"
import type { CheckoutProviderRouter } from "./provider-router"
import type { SessionStoreRouter } from "./session-store-router"

export const checkoutRequestSchema = z.object({
  amount: z
    .union([z.string(), z.number().finite()])
    .transform((value) => (typeof value === "number" ? String(value) : value.trim())),
  currency: z.string(),
  provider_key: z.string().nullish(),
  metadata: z.record(z.unknown()).default({}),
  success_url: z.string().nullish(),
  cancel_url: z.string().nullish(),
})

export type CheckoutRequest = z.input<typeof checkoutRequestSchema>

export type CreateCheckoutOptions = {
  model?: ModelRef
  correlation_id?: string
}

function describeIssues(error: z.ZodError): string {
  const first = error.issues[0]
  if (!first) {
    return "Invalid checkout request."
  }

  const path = first.path.join(".")
  return path ? `${path}: ${first.message}` : first.message
}

/**
 * Creates a hosted-checkout session with the chosen provider and records it
 * as pending. Nothing is stored unless the provider call succeeds.
 */
export class CheckoutDispatcher {
  constructor(
    private readonly providers: CheckoutProviderRouter,
    private readonly store: SessionStoreRouter,
    private readonly scopeOrLogger?: unknown
  ) {}

  async createCheckout(
    request: CheckoutRequest,
    options: CreateCheckoutOptions = {}
  ): Promise<SessionRecord> {
    const correlationId = resolveCorrelationId(options.correlation_id)
    const parsedRequest = checkoutRequestSchema.safeParse(request)
    if (!parsedRequest.success) {
      throw new CheckoutInputError(describeIssues(parsedRequest.error), {
        cause: parsedRequest.error,
      })
    }

    let providerInput: ReturnType<typeof parseCreateCheckoutInput>
    try {
      providerInput = parseCreateCheckoutInput({
        amount: parsedRequest.data.amount,
        currency: parsedRequest.data.currency,
        metadata: parsedRequest.data.metadata,
        correlation_id: correlationId,
        success_url: parsedRequest.data.success_url ?? undefined,
        cancel_url: parsedRequest.data.cancel_url ?? undefined,
      })
    } catch (error) {
      throw new CheckoutInputError(
        error instanceof z.ZodError ? describeIssues(error) : "Invalid checkout request.",
        { cause: error }
      )
    }

    // Resolve the model up front so a bad model fails before the provider is called.
    if (options.model !== undefined) {
      this.store.resolveModel(options.model)
    }

    const provider = this.providers.resolve(parsedRequest.data.provider_key, {
      correlation_id: correlationId,
    })

    const checkout = await this.providers.call(
      provider,
      "create_checkout",
      { correlation_id: correlationId },
      (selected) => selected.createCheckout(providerInput),
      createCheckoutOutputSchema
    )

    const session = await this.store.create(
      {
        payment_id: checkout.payment_id,
        provider_key: provider.key.trim().toLowerCase(),
        amount: providerInput.amount,
        currency: providerInput.currency,
        status: SessionStatus.PENDING,
        raw_provider_payload: checkout.raw_payload,
        redirect_url: checkout.redirect_url,
        metadata: providerInput.metadata,
      },
      options.model
    )

    logEvent(
      "CHECKOUT_SESSION_CREATED",
      {
        amount: session.amount,
        currency: session.currency,
        provider_status: checkout.status,
        has_redirect: Boolean(session.redirect_url),
      },
      correlationId,
      {
        scopeOrLogger: this.scopeOrLogger,
        fields: {
          payment_id: session.payment_id,
          provider_key: session.provider_key,
        },
      }
    )

    return session
  }
}
