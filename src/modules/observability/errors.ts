export type ErrorCategory =
  | "validation"
  | "integrity"
  | "security"
  | "transient_external"
  | "permanent_external"
  | "internal"

export type AppErrorOptions = {
  details?: Record<string, unknown>
  cause?: unknown
  httpStatus?: number
}

type AppErrorInput = {
  code: string
  message: string
  category: ErrorCategory
  httpStatus: number
  details?: Record<string, unknown>
  cause?: unknown
}

type KnownCodeDefaults = {
  category: ErrorCategory
  httpStatus: number
}

export type ApiErrorResponsePayload = {
  code: string
  message: string
}

export type ApiErrorResponse = {
  status: number
  body: ApiErrorResponsePayload
}

// Codes that may arrive as plain objects (e.g. from a provider SDK rejection)
// and still need the right status on the way out.
const KNOWN_ERROR_CODE_DEFAULTS: Record<string, KnownCodeDefaults> = {
  CHECKOUT_INPUT_INVALID: {
    category: "validation",
    httpStatus: 400,
  },
  CHECKOUT_PROVIDER_UNKNOWN: {
    category: "validation",
    httpStatus: 400,
  },
  CHECKOUT_SESSION_NOT_FOUND: {
    category: "validation",
    httpStatus: 404,
  },
  CHECKOUT_SESSION_DUPLICATE: {
    category: "integrity",
    httpStatus: 409,
  },
  WEBHOOK_SIGNATURE_INVALID: {
    category: "security",
    httpStatus: 401,
  },
}

function normalizeCode(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function normalizeMessage(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

function readDetails(value: unknown): Record<string, unknown> | undefined {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return undefined
  }

  return { ...value }
}

export class AppError extends Error {
  code: string
  category: ErrorCategory
  httpStatus: number
  details?: Record<string, unknown>

  constructor(input: AppErrorInput) {
    super(input.message, input.cause !== undefined ? { cause: input.cause } : undefined)
    this.name = "AppError"
    this.code = input.code
    this.category = input.category
    this.httpStatus = input.httpStatus
    this.details = input.details
  }
}

export function validationError(
  code: string,
  message: string,
  options: AppErrorOptions = {}
): AppError {
  return new AppError({
    code,
    message,
    category: "validation",
    httpStatus: options.httpStatus ?? 400,
    details: options.details,
    cause: options.cause,
  })
}

export function integrityError(
  code: string,
  message: string,
  options: AppErrorOptions = {}
): AppError {
  return new AppError({
    code,
    message,
    category: "integrity",
    httpStatus: options.httpStatus ?? 400,
    details: options.details,
    cause: options.cause,
  })
}

export function securityError(
  code: string,
  message: string,
  options: AppErrorOptions = {}
): AppError {
  return new AppError({
    code,
    message,
    category: "security",
    httpStatus: options.httpStatus ?? 401,
    details: options.details,
    cause: options.cause,
  })
}

export function transientExternalError(
  code: string,
  message: string,
  options: AppErrorOptions = {}
): AppError {
  return new AppError({
    code,
    message,
    category: "transient_external",
    httpStatus: options.httpStatus ?? 503,
    details: options.details,
    cause: options.cause,
  })
}

export function permanentExternalError(
  code: string,
  message: string,
  options: AppErrorOptions = {}
): AppError {
  return new AppError({
    code,
    message,
    category: "permanent_external",
    httpStatus: options.httpStatus ?? 502,
    details: options.details,
    cause: options.cause,
  })
}

export function internalError(
  code: string,
  message: string,
  options: AppErrorOptions = {}
): AppError {
  return new AppError({
    code,
    message,
    category: "internal",
    httpStatus: options.httpStatus ?? 500,
    details: options.details,
    cause: options.cause,
  })
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

function fromKnownCode(
  code: string,
  message: string,
  details?: Record<string, unknown>
): AppError {
  const defaults = KNOWN_ERROR_CODE_DEFAULTS[code]

  if (!defaults) {
    return validationError(code, message, { details })
  }

  return new AppError({
    code,
    message,
    category: defaults.category,
    httpStatus: defaults.httpStatus,
    details,
  })
}

export function toAppError(
  error: unknown,
  fallback: {
    code?: string
    message?: string
    httpStatus?: number
    category?: ErrorCategory
  } = {}
): AppError {
  if (isAppError(error)) {
    return error
  }

  const fallbackCode = fallback.code ?? "INTERNAL_ERROR"
  const fallbackMessage = fallback.message ?? "An unexpected error occurred."
  const fallbackStatus = fallback.httpStatus ?? 500
  const fallbackCategory = fallback.category ?? "internal"

  const defaultFallback = new AppError({
    code: fallbackCode,
    message: fallbackMessage,
    category: fallbackCategory,
    httpStatus: fallbackStatus,
    cause: error,
  })

  if (!error || typeof error !== "object") {
    return defaultFallback
  }

  const code = "code" in error ? normalizeCode(error.code) : undefined
  const message = "message" in error ? normalizeMessage(error.message) : undefined
  const details = "details" in error ? readDetails(error.details) : undefined

  // Native errors (e.g. ECONNRESET from a driver) carry a code but must not
  // leak their message to API callers.
  if (!code || error instanceof Error) {
    return defaultFallback
  }

  return fromKnownCode(code, message ?? fallbackMessage, details)
}

export function toApiErrorResponse(
  error: unknown,
  fallback: {
    code?: string
    message?: string
    httpStatus?: number
    category?: ErrorCategory
  } = {}
): ApiErrorResponse {
  const appError = toAppError(error, fallback)

  return {
    status: appError.httpStatus,
    body: {
      code: appError.code,
      message: appError.message,
    },
  }
}
