import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import { z } from "zod"
import {
  CheckoutInputError,
  getCheckoutSessionService,
  getRouteCorrelationId,
  SessionAction,
  sendRouteError,
} from "../../../../modules/checkout-sessions"

const MAX_BULK_PAYMENT_IDS = 100

const bulkBodySchema = z.object({
  action: z.nativeEnum(SessionAction),
  payment_ids: z.array(z.string().trim().min(1)).min(1).max(MAX_BULK_PAYMENT_IDS),
  model: z.string().trim().min(1).optional(),
})

export const POST = async (req: MedusaRequest, res: MedusaResponse) => {
  const correlationId = getRouteCorrelationId(req, res)

  try {
    const parsed = bulkBodySchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new CheckoutInputError(
        issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid bulk request.",
        { cause: parsed.error }
      )
    }

    const result = await getCheckoutSessionService(req.scope).runBulkAction(
      parsed.data.action,
      parsed.data.payment_ids,
      { model: parsed.data.model, correlation_id: correlationId }
    )

    res.status(200).json(result)
  } catch (error) {
    sendRouteError(req, res, error)
  }
}
