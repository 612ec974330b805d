import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import { checkoutErrorHandler, correlationIdMiddleware } from "../middlewares"
import { getCorrelationContext } from "../../modules/logging/correlation"
import { NotFoundError } from "../../modules/checkout-sessions"
import type { RouteResponse } from "../../modules/checkout-sessions"

function makeScope() {
  const logger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }

  return {
    logger,
    scope: {
      resolve: (key: string) => {
        if (key === ContainerRegistrationKeys.LOGGER || key === "logger") {
          return logger
        }

        throw new Error(`Unknown container key: ${key}`)
      },
    },
  }
}

type MockResponse = RouteResponse & {
  status: jest.Mock<RouteResponse, [number]>
  json: jest.Mock<RouteResponse, [unknown]>
  setHeader: jest.Mock
}

function makeResponse(): MockResponse {
  const res: MockResponse = {
    status: jest.fn<RouteResponse, [number]>(() => res),
    json: jest.fn<RouteResponse, [unknown]>(() => res),
    setHeader: jest.fn(),
  }

  return res
}

describe("checkout middlewares", () => {
  it("reuses an incoming x-correlation-id and scopes it to the request", () => {
    const { scope, logger } = makeScope()
    const req = {
      headers: { "x-correlation-id": "corr-checkout-123" },
      method: "post",
      originalUrl: "/store/checkout/pay_1/status",
      params: { payment_id: "pay_1" },
      scope,
    }
    const res = makeResponse()
    let seen: ReturnType<typeof getCorrelationContext>

    correlationIdMiddleware(req, res, () => {
      seen = getCorrelationContext()
    })

    expect(res.setHeader).toHaveBeenCalledWith("x-correlation-id", "corr-checkout-123")
    expect(seen).toEqual({
      correlation_id: "corr-checkout-123",
      step_name: "http_request",
      payment_id: "pay_1",
      provider_key: undefined,
      model: undefined,
    })
    expect(JSON.parse(String(logger.debug.mock.calls[0]?.[0]))).toMatchObject({
      message: "http.request.received",
      correlation_id: "corr-checkout-123",
      payment_id: "pay_1",
      meta: { method: "POST", path: "/store/checkout/pay_1/status" },
    })
  })

  it("generates a correlation id when none is sent", () => {
    const { scope } = makeScope()
    const req: { headers: Record<string, string>; scope: typeof scope; correlation_id?: string } = {
      headers: {},
      scope,
    }
    const next = jest.fn()

    correlationIdMiddleware(req, makeResponse(), next)

    expect(next).toHaveBeenCalledTimes(1)
    expect(req.correlation_id).toEqual(expect.any(String))
    expect(req.correlation_id?.length).toBeGreaterThan(10)
  })

  it("maps errors to the api envelope and logs them", () => {
    const { scope, logger } = makeScope()
    const res = makeResponse()

    checkoutErrorHandler(
      new NotFoundError("pay_missing"),
      { scope, correlation_id: "corr-failed-1", method: "GET", url: "/store/checkout/pay_missing" },
      res
    )

    expect(res.status).toHaveBeenCalledWith(404)
    expect(res.json).toHaveBeenCalledWith({
      code: "CHECKOUT_SESSION_NOT_FOUND",
      message: "Checkout session not found: pay_missing",
      correlation_id: "corr-failed-1",
    })
    expect(JSON.parse(String(logger.warn.mock.calls[0]?.[0]))).toMatchObject({
      message: "http.request.failed",
      error_code: "CHECKOUT_SESSION_NOT_FOUND",
      meta: { status: 404, category: "validation" },
    })
  })
})
