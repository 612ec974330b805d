import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import { z } from "zod"
import {
  CheckoutInputError,
  getCheckoutSessionService,
  getRouteCorrelationId,
  sendRouteError,
} from "../../../modules/checkout-sessions"

const listQuerySchema = z.object({
  model: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(100),
})

export const GET = async (req: MedusaRequest, res: MedusaResponse) => {
  getRouteCorrelationId(req, res)

  try {
    const parsed = listQuerySchema.safeParse(req.query ?? {})
    if (!parsed.success) {
      throw new CheckoutInputError(
        parsed.error.issues[0]?.message ?? "Invalid query parameters.",
        { cause: parsed.error }
      )
    }

    const service = getCheckoutSessionService(req.scope)
    const sessions = await service.listSessions({
      model: parsed.data.model,
      limit: parsed.data.limit,
    })

    res.status(200).json({
      sessions,
      count: sessions.length,
      models: service.listModels(),
    })
  } catch (error) {
    sendRouteError(req, res, error)
  }
}
