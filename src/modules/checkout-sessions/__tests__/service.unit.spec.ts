import { CheckoutErrorCode, SessionStatus } from "../../../../payments/types"
import { DummyCheckoutProvider } from "../../../integrations/checkout-providers"
import { loadCheckoutConfig } from "../config"
import { ConfigurationError } from "../errors"
import { createCheckoutSessionService } from "../service"
import { SessionAction } from "../state-sync"
import { computeWebhookSignature } from "../webhook-verifier"
import { loggedEvents, makeLogger } from "./helpers"

function makeService(env: Record<string, string> = {}) {
  const logger = makeLogger()
  const service = createCheckoutSessionService({
    config: loadCheckoutConfig({ CHECKOUT_WEBHOOK_SECRET: "test-secret", ...env }),
    providers: [new DummyCheckoutProvider({ key: "backup", capabilities: { supportsRefunds: false } })],
    scopeOrLogger: logger,
  })

  return { service, logger }
}

describe("createCheckoutSessionService", () => {
  it("registers the dummy provider next to the given ones", () => {
    const { service } = makeService({ CHECKOUT_DEFAULT_PROVIDER: "backup" })

    expect(service.listProviders()).toEqual([
      {
        key: "dummy",
        is_default: false,
        capabilities: { supportsRefunds: true, supportsCancel: true, supportsWebhooks: true },
      },
      {
        key: "backup",
        is_default: true,
        capabilities: { supportsRefunds: false, supportsCancel: true, supportsWebhooks: true },
      },
    ])
    expect(service.listModels()).toEqual(["default"])
  })

  it("leaves the dummy provider out when it is switched off", () => {
    const { service } = makeService({ CHECKOUT_DUMMY_PROVIDER: "false" })

    expect(service.listProviders().map((provider) => provider.key)).toEqual(["backup"])
  })

  it("needs a database connection for configured tables", () => {
    let thrown: unknown
    try {
      makeService({ CHECKOUT_SESSION_TABLES: "checkout_sessions" })
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(ConfigurationError)
    expect(thrown).toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_CONFIG_INVALID,
      details: { tables: ["checkout_sessions"] },
    })
  })

  it("runs a checkout through a signed webhook and a bulk refund", async () => {
    const { service } = makeService()
    const session = await service.createCheckout({ amount: "19.99", currency: "usd" })
    const body = JSON.stringify({ event_id: "evt_1", payment_id: session.payment_id, status: "paid" })

    const webhook = await service.applyWebhook({
      raw_body: body,
      headers: { "X-Checkout-Signature": computeWebhookSignature(body, "test-secret") },
    })
    const bulk = await service.runBulkAction(SessionAction.REFUND, [session.payment_id])

    expect(webhook).toMatchObject({ matched: true, applied: true, status: SessionStatus.PAID })
    expect(bulk.summary).toEqual({ applied: 1, noop: 0, not_found: 0, failed: 0 })
    expect(await service.getSession(session.payment_id)).toMatchObject({
      status: SessionStatus.REFUNDED,
      currency: "USD",
    })
    expect(await service.listSessions({ limit: 10 })).toHaveLength(1)
  })

  it("lets an operator set a status through the state machine", async () => {
    const { service, logger } = makeService()
    const session = await service.createCheckout({ amount: "3.00", currency: "USD" })

    const paid = await service.updateSessionStatus(session.payment_id, SessionStatus.PAID, {
      correlation_id: "corr_manual_1",
    })
    const reopened = await service.updateSessionStatus(session.payment_id, SessionStatus.PENDING)

    expect(paid).toMatchObject({ applied: true, from: "pending", requested: "paid" })
    expect(reopened).toMatchObject({ applied: false, idempotent: false, from: "paid" })
    expect((await service.getSession(session.payment_id)).status).toBe(SessionStatus.PAID)
    expect(loggedEvents(logger, "CHECKOUT_SESSION_STATE_CHANGE")).toEqual([
      expect.objectContaining({
        correlation_id: "corr_manual_1",
        meta: { from: "pending", to: "paid", source: "manual" },
      }),
    ])
  })

  it("counts stored sessions per provider, unregistered keys last", async () => {
    const { service } = makeService({ CHECKOUT_DEFAULT_PROVIDER: "backup" })
    await service.createCheckout({ amount: "1.00", currency: "USD", provider_key: "backup" })
    await service.createCheckout({ amount: "2.00", currency: "USD", provider_key: "backup" })
    await service.store.create({
      payment_id: "legacy_pay_1",
      provider_key: "legacy",
      amount: "9.00",
      currency: "USD",
      status: SessionStatus.PAID,
      raw_provider_payload: {},
      redirect_url: null,
      metadata: {},
    })

    expect(await service.listProviderUsage()).toEqual([
      {
        key: "dummy",
        is_default: false,
        capabilities: { supportsRefunds: true, supportsCancel: true, supportsWebhooks: true },
        registered: true,
        session_count: 0,
      },
      {
        key: "backup",
        is_default: true,
        capabilities: { supportsRefunds: false, supportsCancel: true, supportsWebhooks: true },
        registered: true,
        session_count: 2,
      },
      {
        key: "legacy",
        is_default: false,
        capabilities: { supportsRefunds: false, supportsCancel: false, supportsWebhooks: false },
        registered: false,
        session_count: 1,
      },
    ])
  })

  it("fills in return urls from CHECKOUT_RETURN_BASE_URL", async () => {
    const { service } = makeService({ CHECKOUT_RETURN_BASE_URL: "https://shop.example/" })

    const defaulted = await service.createCheckout({ amount: "1.00", currency: "USD" })
    const explicit = await service.createCheckout({
      amount: "1.00",
      currency: "USD",
      success_url: "https://elsewhere.example/done",
    })

    expect(defaulted.raw_provider_payload).toMatchObject({
      success_url: "https://shop.example/store/checkout/success",
      cancel_url: "https://shop.example/store/checkout/cancel",
    })
    expect(explicit.raw_provider_payload).toMatchObject({
      success_url: "https://elsewhere.example/done",
      cancel_url: "https://shop.example/store/checkout/cancel",
    })
  })

  it("finds a stored session or returns null", async () => {
    const { service } = makeService()
    const session = await service.createCheckout({ amount: "1.00", currency: "USD" })

    expect(await service.findSession(` ${session.payment_id} `)).toEqual(session)
    expect(await service.findSession("pay_missing")).toBeNull()
    expect(await service.findSession("")).toBeNull()
  })
})
