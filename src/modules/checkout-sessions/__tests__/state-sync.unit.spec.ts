import { CheckoutErrorCode, SessionStatus } from "../../../../payments/types"
import { DummyCheckoutProvider } from "../../../integrations/checkout-providers"
import { __resetMetricsForTests, readCounter } from "../../observability/metrics"
import { CheckoutDispatcher } from "../checkout-dispatcher"
import { CheckoutProviderRouter } from "../provider-router"
import { SessionStoreRouter } from "../session-store-router"
import { SessionAction, StateSyncEngine } from "../state-sync"
import { loggedEvents, makeLogger } from "./helpers"

function makeEngine(provider = new DummyCheckoutProvider()) {
  const logger = makeLogger()
  const store = new SessionStoreRouter()
  const router = new CheckoutProviderRouter({ providers: [provider], scopeOrLogger: logger })
  const engine = new StateSyncEngine(router, store, {
    now: () => new Date("2026-03-01T12:00:00.000Z"),
    scopeOrLogger: logger,
  })

  return {
    logger,
    provider,
    store,
    engine,
    dispatcher: new CheckoutDispatcher(router, store, logger),
  }
}

describe("StateSyncEngine", () => {
  beforeEach(() => {
    __resetMetricsForTests()
  })

  it("takes a 19.99 USD dummy checkout through paid to refunded", async () => {
    const { dispatcher, engine, provider, store } = makeEngine()

    const created = await dispatcher.createCheckout({
      amount: "19.99",
      currency: "USD",
      provider_key: "dummy",
    })
    expect(created.status).toBe("pending")
    expect(created.payment_id).not.toBe("")

    provider.setRemoteStatus(created.payment_id, "paid")
    const synced = await engine.sync(created.payment_id)
    const refunded = await engine.refund(created.payment_id)

    expect(synced).toMatchObject({ from: "pending", requested: "paid", applied: true })
    expect(refunded).toMatchObject({ from: "paid", requested: "refunded", applied: true })
    expect(await store.get(created.payment_id)).toMatchObject({
      status: SessionStatus.REFUNDED,
      provider_key: "dummy",
      amount: "19.99",
      currency: "USD",
      updated_at: "2026-03-01T12:00:00.000Z",
      raw_provider_payload: {
        id: created.payment_id,
        status: "refunded",
        amount: "19.99",
        currency: "USD",
      },
    })
  })

  it("applies an allowed transition once and logs the state change", async () => {
    const { dispatcher, engine, logger } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "5.00", currency: "EUR" })

    const first = await engine.applyTransition({
      payment_id: created.payment_id,
      target: SessionStatus.PAID,
      source: "webhook",
      raw_payload: { event: "payment.paid" },
      correlation_id: "corr_sync_1",
    })
    const second = await engine.applyTransition({
      payment_id: created.payment_id,
      target: SessionStatus.PAID,
      source: "webhook",
    })

    expect(first).toMatchObject({ applied: true, idempotent: false, from: "pending", model: "default" })
    expect(first.session.raw_provider_payload).toEqual({ event: "payment.paid" })
    expect(second).toMatchObject({ applied: false, idempotent: true, from: "paid" })
    expect(loggedEvents(logger, "CHECKOUT_SESSION_STATE_CHANGE")).toEqual([
      expect.objectContaining({
        correlation_id: "corr_sync_1",
        payment_id: created.payment_id,
        meta: { from: "pending", to: "paid", source: "webhook" },
      }),
    ])
    expect(
      readCounter("checkout.session.transition.total", { source: "webhook", applied: true })
    ).toBe(1)
  })

  it("ignores a move out of a terminal status and leaves an audit line", async () => {
    const { dispatcher, engine, logger, store } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "5.00", currency: "EUR" })
    await engine.applyTransition({
      payment_id: created.payment_id,
      target: SessionStatus.FAILED,
      source: "webhook",
    })
    const before = await store.get(created.payment_id)

    const outcome = await engine.applyTransition({
      payment_id: created.payment_id,
      target: SessionStatus.PAID,
      source: "webhook",
      raw_payload: { late: true },
    })

    expect(outcome).toMatchObject({ applied: false, idempotent: false, from: "failed" })
    expect(await store.get(created.payment_id)).toEqual(before)
    expect(loggedEvents(logger, "CHECKOUT_SESSION_TRANSITION_IGNORED")).toEqual([
      expect.objectContaining({
        level: "warn",
        meta: expect.objectContaining({ reason: "terminal_status" }),
      }),
    ])
  })

  it("does not call the provider for a refund the session cannot take", async () => {
    const { dispatcher, engine, provider } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "5.00", currency: "EUR" })

    const outcome = await engine.refund(created.payment_id)

    expect(outcome).toMatchObject({ applied: false, from: "pending", requested: "refunded" })
    expect(outcome.session.status).toBe("pending")
    expect(provider.callsTo("refund")).toBe(0)
  })

  it("cancels a pending session through the provider", async () => {
    const { dispatcher, engine, provider } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "5.00", currency: "EUR" })

    const outcome = await engine.perform(SessionAction.CANCEL, created.payment_id)

    expect(outcome).toMatchObject({ applied: true, requested: "cancelled" })
    expect(provider.callsTo("cancel")).toBe(1)
  })

  it("leaves the session untouched when the provider refuses", async () => {
    const provider = new DummyCheckoutProvider({ capabilities: { supportsRefunds: false } })
    const { dispatcher, engine, store } = makeEngine(provider)
    const created = await dispatcher.createCheckout({ amount: "5.00", currency: "EUR" })
    await engine.applyTransition({
      payment_id: created.payment_id,
      target: SessionStatus.PAID,
      source: "webhook",
    })

    await expect(engine.refund(created.payment_id)).rejects.toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED,
      details: { provider_error_code: CheckoutErrorCode.NOT_SUPPORTED },
    })
    expect((await store.get(created.payment_id)).status).toBe("paid")
  })

  it("keeps a pending session pending when the provider still reports it open", async () => {
    const { dispatcher, engine, provider } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "5.00", currency: "EUR" })
    provider.setRemoteStatus(created.payment_id, "processing")

    const outcome = await engine.perform(SessionAction.SYNC, created.payment_id)

    expect(outcome).toMatchObject({ applied: false, idempotent: true, requested: "pending" })
  })

  it("raises NotFoundError for an unknown payment id", async () => {
    const { engine } = makeEngine()

    await expect(engine.sync("pay_404")).rejects.toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_SESSION_NOT_FOUND,
    })
    await expect(
      engine.applyTransition({ payment_id: "pay_404", target: SessionStatus.PAID, source: "manual" })
    ).rejects.toMatchObject({ code: CheckoutErrorCode.CHECKOUT_SESSION_NOT_FOUND })
  })
  it("calls the provider once when the same refund arrives three times at once", async () => {
    const { dispatcher, engine, provider, store } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "12.00", currency: "USD" })
    await engine.applyTransition({
      payment_id: created.payment_id,
      target: SessionStatus.PAID,
      source: "webhook",
    })

    const outcomes = await Promise.all([
      engine.refund(created.payment_id),
      engine.refund(created.payment_id),
      engine.refund(created.payment_id),
    ])

    expect(provider.callsTo("refund")).toBe(1)
    expect(outcomes.map((outcome) => outcome.applied)).toEqual([true, false, false])
    expect(outcomes.map((outcome) => outcome.idempotent)).toEqual([false, true, true])
    expect((await store.get(created.payment_id)).status).toBe("refunded")
  })

  it("keeps a cancel and a paid webhook for one session consistent", async () => {
    const { dispatcher, engine, provider, store } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "12.00", currency: "USD" })

    const [cancelled, paid] = await Promise.all([
      engine.cancel(created.payment_id),
      engine.applyTransition({
        payment_id: created.payment_id,
        target: SessionStatus.PAID,
        source: "webhook",
      }),
    ])

    expect(provider.callsTo("cancel")).toBe(1)
    expect(cancelled).toMatchObject({ applied: true, from: "pending", requested: "cancelled" })
    expect(paid).toMatchObject({ applied: false, from: "cancelled", requested: "paid" })
    expect((await store.get(created.payment_id)).status).toBe("cancelled")
  })

  it("skips the provider cancel when a paid webhook settles the session first", async () => {
    const { dispatcher, engine, provider, store } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "12.00", currency: "USD" })

    const [paid, cancelled] = await Promise.all([
      engine.applyTransition({
        payment_id: created.payment_id,
        target: SessionStatus.PAID,
        source: "webhook",
      }),
      engine.cancel(created.payment_id),
    ])

    expect(provider.callsTo("cancel")).toBe(0)
    expect(paid).toMatchObject({ applied: true, from: "pending" })
    expect(cancelled).toMatchObject({ applied: false, from: "paid", requested: "cancelled" })
    expect((await store.get(created.payment_id)).status).toBe("paid")
  })

  it("releases the payment lock when the provider call fails", async () => {
    const { dispatcher, engine, provider, store } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "12.00", currency: "USD" })
    provider.failWith("cancel", "gateway down")

    await expect(engine.cancel(created.payment_id)).rejects.toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED,
    })

    provider.failWith("cancel", null)
    const outcome = await engine.cancel(created.payment_id)

    expect(outcome.applied).toBe(true)
    expect((await store.get(created.payment_id)).status).toBe("cancelled")
  })

  it("records reconciliation as the transition source when asked", async () => {
    const { dispatcher, engine, provider, logger } = makeEngine()
    const created = await dispatcher.createCheckout({ amount: "5.00", currency: "EUR" })
    provider.setRemoteStatus(created.payment_id, "paid")

    await engine.sync(created.payment_id, { source: "reconcile" })

    expect(
      readCounter("checkout.session.transition.total", { source: "reconcile", applied: true })
    ).toBe(1)
    expect(loggedEvents(logger, "CHECKOUT_SESSION_STATE_CHANGE")).toEqual([
      expect.objectContaining({
        payment_id: created.payment_id,
        meta: { from: "pending", to: "paid", source: "reconcile" },
      }),
    ])
  })
})
