import type { IncomingHttpHeaders } from "http"
import type { SessionRecord } from "../../../payments/types"
import {
  CORRELATION_ID_HEADER,
  extractCorrelationIdFromRequest,
} from "../logging/correlation"
import { toApiErrorResponse } from "../observability/errors"
import { getCheckoutSessionService } from "./runtime"

/**
 * The parts of a Medusa request the checkout routes read. `MedusaRequest`
 * satisfies it.
 */
export type RouteRequest = {
  scope?: unknown
  params?: Record<string, string | undefined>
  query?: Record<string, unknown>
  body?: unknown
  rawBody?: unknown
  headers?: IncomingHttpHeaders
  correlation_id?: string
}

export type RouteResponse = {
  status: (code: number) => RouteResponse
  json: (body: unknown) => unknown
  setHeader?: (name: string, value: string) => unknown
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

export function getRouteCorrelationId(req: RouteRequest, res?: RouteResponse): string {
  const correlationId = extractCorrelationIdFromRequest(req)
  req.correlation_id = correlationId
  res?.setHeader?.(CORRELATION_ID_HEADER, correlationId)
  return correlationId
}

export function readRouteParam(req: RouteRequest, name: string): string {
  return readText(req.params?.[name])
}

export function readQueryText(req: RouteRequest, name: string): string {
  const value = req.query?.[name]
  return readText(Array.isArray(value) ? value[0] : value)
}

export function readBody(req: RouteRequest): Record<string, unknown> {
  const body = req.body
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    return {}
  }

  return Object.fromEntries(Object.entries(body))
}

export function sendRouteError(
  req: RouteRequest,
  res: RouteResponse,
  error: unknown,
  fallback?: Parameters<typeof toApiErrorResponse>[1]
): void {
  const mapped = toApiErrorResponse(error, fallback)
  res.status(mapped.status).json({
    ...mapped.body,
    correlation_id: req.correlation_id ?? extractCorrelationIdFromRequest(req),
  })
}

export type PublicSessionView = Omit<SessionRecord, "raw_provider_payload">

export function toPublicSession(record: SessionRecord): PublicSessionView {
  const { raw_provider_payload: _raw, ...view } = record
  return view
}

export type CheckoutLandingOutcome = "success" | "cancelled"

/**
 * Where the hosted checkout sends the buyer back to. Reports the stored
 * session as it is; the webhook or a status sync settles it.
 */
export async function sendCheckoutLanding(
  req: RouteRequest,
  res: RouteResponse,
  outcome: CheckoutLandingOutcome
): Promise<void> {
  getRouteCorrelationId(req, res)

  try {
    const paymentId = readQueryText(req, "payment_id")
    const session = paymentId
      ? await getCheckoutSessionService(req.scope).findSession(paymentId)
      : null

    res.status(200).json({
      status: outcome,
      payment_id: paymentId || null,
      session: session ? toPublicSession(session) : null,
    })
  } catch (error) {
    sendRouteError(req, res, error)
  }
}
