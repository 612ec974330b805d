import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import { sendCheckoutLanding } from "../../../../modules/checkout-sessions"

export const GET = async (req: MedusaRequest, res: MedusaResponse) => {
  await sendCheckoutLanding(req, res, "success")
}
