import { z } from "zod"
import { CheckoutErrorCode, type CheckoutErrorCode as CheckoutErrorCodeType } from "../types"

const nonEmptyString = z.string().trim().min(1)
const currencySchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z]{3}$/, "currency must be a 3-letter ISO-4217 code")
  .transform((value) => value.toUpperCase())
const decimalAmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "amount must be a decimal string")
  .refine((value) => Number(value) > 0, "amount must be greater than zero")
const checkoutErrorCodeSchema = z.nativeEnum(CheckoutErrorCode)
const rawPayloadSchema = z.record(z.unknown())

export const createCheckoutInputSchema = z
  .object({
    amount: decimalAmountSchema,
    currency: currencySchema,
    metadata: z.record(z.unknown()),
    correlation_id: nonEmptyString,
    // Where the hosted page sends the buyer back to.
    success_url: z.string().trim().url().optional(),
    cancel_url: z.string().trim().url().optional(),
  })
  .strict()

export type CreateCheckoutInput = z.infer<typeof createCheckoutInputSchema>

// `status` stays in the provider's own vocabulary; callers map it.
export const createCheckoutOutputSchema = z.object({
  payment_id: nonEmptyString,
  status: nonEmptyString,
  redirect_url: z.string().trim().url().nullable().default(null),
  raw_payload: rawPayloadSchema,
})

export type CreateCheckoutOutput = z.infer<typeof createCheckoutOutputSchema>

export const sessionActionInputSchema = z
  .object({
    payment_id: nonEmptyString,
    amount: decimalAmountSchema,
    currency: currencySchema,
    correlation_id: nonEmptyString,
  })
  .strict()

export type SessionActionInput = z.infer<typeof sessionActionInputSchema>

export const sessionOperationOutputSchema = z.object({
  status: nonEmptyString,
  raw_payload: rawPayloadSchema,
})

export type SessionOperationOutput = z.infer<typeof sessionOperationOutputSchema>

export const providerMappedErrorSchema = z
  .object({
    code: checkoutErrorCodeSchema,
    message: nonEmptyString,
    details: z.record(z.unknown()),
    correlation_id: nonEmptyString,
  })
  .strict()

export type ProviderMappedError = {
  code: CheckoutErrorCodeType
  message: string
  details: Record<string, unknown>
  correlation_id: string
}

export type ProviderResult<TSuccess> =
  | { ok: true; data: TSuccess }
  | { ok: false; error: ProviderMappedError }

export const providerCapabilitiesSchema = z
  .object({
    supportsRefunds: z.boolean(),
    supportsCancel: z.boolean(),
    supportsWebhooks: z.boolean(),
  })
  .strict()

export type ProviderCapabilities = z.infer<typeof providerCapabilitiesSchema>

/**
 * A hosted-checkout payment provider. Implementations report failures as
 * `{ ok: false }` results; anything they throw is treated the same way by
 * the registry.
 */
export interface ICheckoutProvider {
  readonly key: string

  createCheckout(
    input: CreateCheckoutInput
  ): Promise<ProviderResult<CreateCheckoutOutput>>

  refund(input: SessionActionInput): Promise<ProviderResult<SessionOperationOutput>>

  cancel(input: SessionActionInput): Promise<ProviderResult<SessionOperationOutput>>

  fetchStatus(
    input: SessionActionInput
  ): Promise<ProviderResult<SessionOperationOutput>>

  getCapabilities(): ProviderCapabilities
}

export function parseCreateCheckoutInput(value: unknown): CreateCheckoutInput {
  return createCheckoutInputSchema.parse(value)
}

export function parseProviderCapabilities(value: unknown): ProviderCapabilities {
  return providerCapabilitiesSchema.parse(value)
}

export function notSupportedResult(input: {
  message: string
  correlation_id: string
  details?: Record<string, unknown>
}): ProviderResult<never> {
  return {
    ok: false,
    error: {
      code: CheckoutErrorCode.NOT_SUPPORTED,
      message: input.message,
      details: input.details ?? {},
      correlation_id: input.correlation_id,
    },
  }
}
