import { defineMiddlewares } from "@medusajs/framework/http"
import {
  sendRouteError,
  type RouteRequest,
  type RouteResponse,
} from "../modules/checkout-sessions/http"
import {
  CORRELATION_ID_HEADER,
  extractCorrelationIdFromRequest,
  runWithCorrelationContext,
  setCorrelationContext,
} from "../modules/logging/correlation"
import { logEvent } from "../modules/logging/log-event"
import { toAppError } from "../modules/observability/errors"

type MiddlewareRequest = RouteRequest & {
  method?: string
  originalUrl?: string
  url?: string
}

function normalizeText(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined
  }

  const normalized = value.trim()
  return normalized || undefined
}

export function correlationIdMiddleware(
  req: MiddlewareRequest,
  res: RouteResponse,
  next: () => void
): void {
  const correlationId = extractCorrelationIdFromRequest(req)
  req.correlation_id = correlationId
  res.setHeader?.(CORRELATION_ID_HEADER, correlationId)

  runWithCorrelationContext(correlationId, () => {
    setCorrelationContext({
      correlation_id: correlationId,
      step_name: "http_request",
      payment_id: normalizeText(req.params?.payment_id),
    })

    logEvent(
      "http.request.received",
      {
        method: normalizeText(req.method)?.toUpperCase(),
        path: normalizeText(req.originalUrl ?? req.url),
      },
      correlationId,
      {
        level: "debug",
        scopeOrLogger: req.scope,
      }
    )

    next()
  })
}

export function checkoutErrorHandler(
  error: unknown,
  req: MiddlewareRequest,
  res: RouteResponse
): void {
  const appError = toAppError(error)
  const correlationId = req.correlation_id ?? extractCorrelationIdFromRequest(req)

  logEvent(
    "http.request.failed",
    {
      method: normalizeText(req.method)?.toUpperCase(),
      path: normalizeText(req.originalUrl ?? req.url),
      status: appError.httpStatus,
      category: appError.category,
    },
    correlationId,
    {
      level: appError.httpStatus >= 500 ? "error" : "warn",
      scopeOrLogger: req.scope,
      fields: { error_code: appError.code },
    }
  )

  sendRouteError(req, res, appError)
}

export default defineMiddlewares({
  errorHandler: (error, req, res, _next) => {
    checkoutErrorHandler(error, req, res)
  },
  routes: [
    {
      matcher: /^\/(store|admin|webhooks)\/(checkout|checkout-providers|checkout-sessions|observability)(\/|$)/,
      middlewares: [correlationIdMiddleware],
    },
    {
      methods: ["POST"],
      matcher: "/webhooks/checkout",
      bodyParser: {
        preserveRawBody: true,
      },
    },
  ],
})
