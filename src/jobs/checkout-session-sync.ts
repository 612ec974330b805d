import type { MedusaContainer } from "@medusajs/framework/types"
import { DEFAULT_SYNC_CRON, getCheckoutSessionService } from "../modules/checkout-sessions"

export default async function checkoutSessionSyncJob(container: MedusaContainer) {
  await getCheckoutSessionService(container).syncStaleSessions()
}

export const config = {
  name: "checkout-session-sync",
  schedule: process.env.CHECKOUT_SYNC_CRON?.trim() || DEFAULT_SYNC_CRON,
}
