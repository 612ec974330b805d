import type { MedusaRequest, MedusaResponse } from "@medusajs/framework/http"
import {
  getRouteCorrelationId,
  readQueryText,
  sendRouteError,
} from "../../../../modules/checkout-sessions"
import { validationError } from "../../../../modules/observability/errors"
import { getMetricsSnapshot } from "../../../../modules/observability/metrics"

export const GET = async (req: MedusaRequest, res: MedusaResponse) => {
  getRouteCorrelationId(req, res)

  try {
    if (process.env.NODE_ENV !== "development") {
      throw validationError(
        "METRICS_SNAPSHOT_DISABLED",
        "Metrics snapshot endpoint is only available in development.",
        { httpStatus: 404 }
      )
    }

    const prefix = readQueryText(req, "prefix")
    const snapshot = getMetricsSnapshot()

    res.status(200).json({
      metrics: prefix
        ? {
            ...snapshot,
            counters: snapshot.counters.filter((entry) => entry.name.startsWith(prefix)),
            timers: snapshot.timers.filter((entry) => entry.name.startsWith(prefix)),
          }
        : snapshot,
    })
  } catch (error) {
    sendRouteError(req, res, error, {
      code: "METRICS_SNAPSHOT_FAILED",
      message: "Failed to read metrics snapshot.",
      httpStatus: 500,
      category: "internal",
    })
  }
}
