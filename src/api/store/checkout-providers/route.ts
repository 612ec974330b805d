import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import {
  getCheckoutSessionService,
  getRouteCorrelationId,
  sendRouteError,
} from "../../../modules/checkout-sessions"

export const GET = async (req: MedusaRequest, res: MedusaResponse) => {
  getRouteCorrelationId(req, res)

  try {
    res.status(200).json({
      providers: getCheckoutSessionService(req.scope).listProviders(),
    })
  } catch (error) {
    sendRouteError(req, res, error)
  }
}
