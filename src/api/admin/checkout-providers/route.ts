import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import {
  getCheckoutSessionService,
  getRouteCorrelationId,
  readQueryText,
  sendRouteError,
} from "../../../modules/checkout-sessions"

/** Registered providers with how many stored sessions each one owns. */
export const GET = async (req: MedusaRequest, res: MedusaResponse) => {
  getRouteCorrelationId(req, res)

  try {
    const model = readQueryText(req, "model") || undefined
    const providers = await getCheckoutSessionService(req.scope).listProviderUsage(model)

    res.status(200).json({
      providers,
      count: providers.length,
    })
  } catch (error) {
    sendRouteError(req, res, error)
  }
}
