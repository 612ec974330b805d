import {
  createCheckoutOutputSchema,
  sessionOperationOutputSchema,
} from "../../../../payments/provider"
import { CheckoutErrorCode } from "../../../../payments/types"
import { DummyCheckoutProvider } from "../../../integrations/checkout-providers"
import { __resetMetricsForTests, readCounter } from "../../observability/metrics"
import { ProviderError } from "../errors"
import { CheckoutProviderRouter } from "../provider-router"
import { loggedEvents, makeLogger } from "./helpers"

const context = { correlation_id: "corr_router_1", payment_id: "pay_1" }

describe("CheckoutProviderRouter", () => {
  beforeEach(() => {
    __resetMetricsForTests()
  })

  it("selects by key, then the configured default, then the first registered", () => {
    const dummy = new DummyCheckoutProvider()
    const alt = new DummyCheckoutProvider({ key: "alt" })

    const withDefault = new CheckoutProviderRouter({
      providers: [dummy, alt],
      default_provider: "ALT",
    })
    const withoutDefault = new CheckoutProviderRouter({ providers: [dummy, alt] })

    expect(withDefault.resolve(" Dummy ")).toBe(dummy)
    expect(withDefault.resolve()).toBe(alt)
    expect(withDefault.defaultKey()).toBe("alt")
    expect(withoutDefault.resolve(null)).toBe(dummy)
    expect(withoutDefault.defaultKey()).toBe("dummy")
  })

  it("raises UnknownProviderError for an empty registry or an unknown key", () => {
    const empty = new CheckoutProviderRouter()
    const router = new CheckoutProviderRouter({ providers: [new DummyCheckoutProvider()] })

    expect(() => empty.resolve()).toThrow("No checkout provider is registered.")
    expect(() => router.resolve("stripe")).toThrow(
      "Checkout provider is not registered: stripe"
    )
    expect(empty.defaultKey()).toBeNull()
  })

  it("refuses a second provider under a taken key", () => {
    const router = new CheckoutProviderRouter({ providers: [new DummyCheckoutProvider()] })

    expect(() => router.register(new DummyCheckoutProvider())).toThrow(
      "Checkout provider key is already taken: dummy"
    )
    expect(router.listKeys()).toEqual(["dummy"])
  })

  it("returns the parsed output and logs a successful call", async () => {
    const logger = makeLogger()
    const provider = new DummyCheckoutProvider()
    const router = new CheckoutProviderRouter({ providers: [provider], scopeOrLogger: logger })
    provider.setRemoteStatus("pay_1", "succeeded")

    const output = await router.call(
      provider,
      "fetch_status",
      context,
      (selected) =>
        selected.fetchStatus({
          payment_id: "pay_1",
          amount: "1.00",
          currency: "USD",
          correlation_id: context.correlation_id,
        }),
      sessionOperationOutputSchema
    )

    expect(output).toEqual({ status: "succeeded", raw_payload: { id: "pay_1", status: "succeeded" } })
    expect(loggedEvents(logger, "CHECKOUT_PROVIDER_CALL")).toEqual([
      expect.objectContaining({
        level: "info",
        provider_key: "dummy",
        payment_id: "pay_1",
        meta: expect.objectContaining({ method: "fetch_status", success: true }),
      }),
    ])
    expect(readCounter("checkout.provider.call.total", { provider: "dummy" })).toBe(1)
  })

  it("wraps a thrown provider error with the cause", async () => {
    const provider = new DummyCheckoutProvider()
    const router = new CheckoutProviderRouter({ providers: [provider], scopeOrLogger: makeLogger() })
    const cause = new Error("socket hang up")

    const promise = router.call(
      provider,
      "refund",
      context,
      async () => {
        throw cause
      },
      sessionOperationOutputSchema
    )

    await expect(promise).rejects.toBeInstanceOf(ProviderError)
    await expect(promise).rejects.toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED,
      httpStatus: 502,
      cause,
      details: { provider_key: "dummy", method: "refund", payment_id: "pay_1" },
    })
  })

  it("turns an ok:false result into CHECKOUT_PROVIDER_FAILED with the provider code", async () => {
    const provider = new DummyCheckoutProvider({ capabilities: { supportsCancel: false } })
    const router = new CheckoutProviderRouter({ providers: [provider], scopeOrLogger: makeLogger() })

    await expect(
      router.call(
        provider,
        "cancel",
        context,
        (selected) =>
          selected.cancel({
            payment_id: "pay_1",
            amount: "1.00",
            currency: "USD",
            correlation_id: context.correlation_id,
          }),
        sessionOperationOutputSchema
      )
    ).rejects.toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_PROVIDER_FAILED,
      message: "dummy does not support cancellation.",
      details: { provider_error_code: CheckoutErrorCode.NOT_SUPPORTED },
    })
  })

  it("rejects a response that does not match the expected shape", async () => {
    const provider = new DummyCheckoutProvider()
    const router = new CheckoutProviderRouter({ providers: [provider], scopeOrLogger: makeLogger() })

    await expect(
      router.call(
        provider,
        "create_checkout",
        context,
        async () => ({ ok: true, data: { status: "pending" } }),
        createCheckoutOutputSchema
      )
    ).rejects.toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_PROVIDER_INVALID_RESPONSE,
      httpStatus: 502,
    })
  })

  it("times out a provider that never answers", async () => {
    const provider = new DummyCheckoutProvider()
    const router = new CheckoutProviderRouter({
      providers: [provider],
      timeout_ms: 50,
      scopeOrLogger: makeLogger(),
    })

    await expect(
      router.call(
        provider,
        "fetch_status",
        context,
        () => new Promise(() => undefined),
        sessionOperationOutputSchema
      )
    ).rejects.toMatchObject({
      code: CheckoutErrorCode.CHECKOUT_PROVIDER_TIMEOUT,
      httpStatus: 504,
      category: "transient_external",
      details: { timeout_ms: 50 },
    })
  })
})
