import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import {
  getCheckoutSessionService,
  getRouteCorrelationId,
  readBody,
  sendRouteError,
  toPublicSession,
} from "../../../modules/checkout-sessions"

export const POST = async (req: MedusaRequest, res: MedusaResponse) => {
  const correlationId = getRouteCorrelationId(req, res)

  try {
    const body = readBody(req)
    const service = getCheckoutSessionService(req.scope)
    const session = await service.createCheckout(
      {
        amount: typeof body.amount === "number" ? body.amount : String(body.amount ?? ""),
        currency: typeof body.currency === "string" ? body.currency : "",
        provider_key: typeof body.provider_key === "string" ? body.provider_key : null,
        metadata: readMetadata(body.metadata),
        success_url: typeof body.success_url === "string" ? body.success_url : null,
        cancel_url: typeof body.cancel_url === "string" ? body.cancel_url : null,
      },
      { correlation_id: correlationId }
    )

    res.status(201).json({ session: toPublicSession(session) })
  } catch (error) {
    sendRouteError(req, res, error)
  }
}

function readMetadata(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return {}
  }

  return Object.fromEntries(Object.entries(value))
}
