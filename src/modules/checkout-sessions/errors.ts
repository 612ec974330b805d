import { CheckoutErrorCode } from "../../../payments/types"
import { AppError, type AppErrorOptions } from "../observability/errors"

type DomainErrorOptions = Omit<AppErrorOptions, "httpStatus">

export class ConfigurationError extends AppError {
  constructor(
    message: string,
    options: AppErrorOptions & {
      code?: string
    } = {}
  ) {
    super({
      code: options.code ?? CheckoutErrorCode.CHECKOUT_MODEL_NOT_REGISTERED,
      message,
      category: "validation",
      httpStatus: options.httpStatus ?? 400,
      details: options.details,
      cause: options.cause,
    })
    this.name = "ConfigurationError"
  }
}

export class UnknownProviderError extends AppError {
  constructor(providerKey: string | null, options: DomainErrorOptions = {}) {
    super({
      code: CheckoutErrorCode.CHECKOUT_PROVIDER_UNKNOWN,
      message: providerKey
        ? `Checkout provider is not registered: ${providerKey}`
        : "No checkout provider is registered.",
      category: "validation",
      httpStatus: 400,
      details: { provider_key: providerKey, ...options.details },
      cause: options.cause,
    })
    this.name = "UnknownProviderError"
  }
}

export class CheckoutInputError extends AppError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super({
      code: CheckoutErrorCode.CHECKOUT_INPUT_INVALID,
      message,
      category: "validation",
      httpStatus: 400,
      details: options.details,
      cause: options.cause,
    })
    this.name = "CheckoutInputError"
  }
}

export class NotFoundError extends AppError {
  constructor(paymentId: string, options: DomainErrorOptions = {}) {
    super({
      code: CheckoutErrorCode.CHECKOUT_SESSION_NOT_FOUND,
      message: `Checkout session not found: ${paymentId}`,
      category: "validation",
      httpStatus: 404,
      details: { payment_id: paymentId, ...options.details },
      cause: options.cause,
    })
    this.name = "NotFoundError"
  }
}

export class DuplicateSessionError extends AppError {
  constructor(paymentId: string, model: string) {
    super({
      code: CheckoutErrorCode.CHECKOUT_SESSION_DUPLICATE,
      message: `Checkout session already exists: ${paymentId}`,
      category: "integrity",
      httpStatus: 409,
      details: { payment_id: paymentId, model },
    })
    this.name = "DuplicateSessionError"
  }
}

export class ConcurrentUpdateError extends AppError {
  constructor(paymentId: string, attempts: number) {
    super({
      code: CheckoutErrorCode.CHECKOUT_SESSION_CONFLICT,
      message: `Checkout session kept changing during update: ${paymentId}`,
      category: "integrity",
      httpStatus: 409,
      details: { payment_id: paymentId, attempts },
    })
    this.name = "ConcurrentUpdateError"
  }
}

export class InvalidSignatureError extends AppError {
  constructor(reason: string) {
    super({
      code: CheckoutErrorCode.WEBHOOK_SIGNATURE_INVALID,
      message: "Webhook signature verification failed.",
      category: "security",
      httpStatus: 401,
      details: { reason },
    })
    this.name = "InvalidSignatureError"
  }
}

export class WebhookPayloadError extends AppError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super({
      code: CheckoutErrorCode.WEBHOOK_PAYLOAD_INVALID,
      message,
      category: "validation",
      httpStatus: 400,
      details: options.details,
      cause: options.cause,
    })
    this.name = "WebhookPayloadError"
  }
}

export type ProviderErrorCode =
  | typeof CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED
  | typeof CheckoutErrorCode.CHECKOUT_PROVIDER_TIMEOUT
  | typeof CheckoutErrorCode.CHECKOUT_PROVIDER_INVALID_RESPONSE

const PROVIDER_ERROR_STATUS: Record<ProviderErrorCode, number> = {
  [CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED]: 502,
  [CheckoutErrorCode.CHECKOUT_PROVIDER_TIMEOUT]: 504,
  [CheckoutErrorCode.CHECKOUT_PROVIDER_INVALID_RESPONSE]: 502,
}

export class ProviderError extends AppError {
  readonly provider_key: string
  readonly method: string

  constructor(input: {
    code?: ProviderErrorCode
    message: string
    provider_key: string
    method: string
    details?: Record<string, unknown>
    cause?: unknown
  }) {
    const code = input.code ?? CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED
    super({
      code,
      message: input.message,
      category:
        code === CheckoutErrorCode.CHECKOUT_PROVIDER_TIMEOUT
          ? "transient_external"
          : "permanent_external",
      httpStatus: PROVIDER_ERROR_STATUS[code],
      details: {
        provider_key: input.provider_key,
        method: input.method,
        ...input.details,
      },
      cause: input.cause,
    })
    this.name = "ProviderError"
    this.provider_key = input.provider_key
    this.method = input.method
  }
}
