import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import {
  getCheckoutSessionService,
  getRouteCorrelationId,
  sendRouteError,
  type RouteRequest,
} from "../../../modules/checkout-sessions"

function readRawBody(req: RouteRequest): Buffer | string {
  if (Buffer.isBuffer(req.rawBody) || typeof req.rawBody === "string") {
    return req.rawBody
  }

  // Only matches a signature computed over the same JSON serialisation.
  return req.body === undefined ? "" : JSON.stringify(req.body)
}

export const POST = async (req: MedusaRequest, res: MedusaResponse) => {
  const correlationId = getRouteCorrelationId(req, res)

  try {
    const result = await getCheckoutSessionService(req.scope).applyWebhook({
      raw_body: readRawBody(req),
      headers: req.headers ?? {},
      correlation_id: correlationId,
    })

    res.status(200).json({
      received: true,
      event_id: result.event_id,
      event_type: result.event_type,
      payment_id: result.payment_id,
      status: result.status,
      matched: result.matched,
      deduped: result.deduped,
      applied: result.applied,
    })
  } catch (error) {
    sendRouteError(req, res, error)
  }
}
