import crypto from "crypto"
import { CheckoutErrorCode } from "../../../../payments/types"
import { decodeCheckoutWebhook } from "../webhook-event"

function body(value: unknown): Buffer {
  return Buffer.from(JSON.stringify(value), "utf8")
}

describe("decodeCheckoutWebhook", () => {
  it("maps an explicit provider status", () => {
    const event = decodeCheckoutWebhook(
      body({
        event_id: "evt_1",
        event_type: "Payment.Updated",
        payment_id: "pay_1",
        status: "succeeded",
        provider: "Dummy",
        occurred_at: "2026-03-01T00:00:00.000Z",
      })
    )

    expect(event).toEqual({
      provider: "dummy",
      event_id: "evt_1",
      event_type: "payment.updated",
      payment_id: "pay_1",
      status_mapped: "paid",
      raw_status: "succeeded",
      occurred_at: "2026-03-01T00:00:00.000Z",
      payload: {
        event_id: "evt_1",
        event_type: "Payment.Updated",
        payment_id: "pay_1",
        status: "succeeded",
        provider: "Dummy",
        occurred_at: "2026-03-01T00:00:00.000Z",
      },
    })
  })

  it("falls back to session_id, the event type suffix and a body hash", () => {
    const raw = body({ session_id: "pay_2", event_type: "payment.canceled" })

    const event = decodeCheckoutWebhook(raw)

    expect(event).toMatchObject({
      provider: "checkout",
      payment_id: "pay_2",
      status_mapped: "cancelled",
      event_type: "payment.canceled",
      event_id: `hash_${crypto.createHash("sha256").update(raw).digest("hex")}`,
    })
  })

  it("accepts an open-session event type as pending", () => {
    expect(
      decodeCheckoutWebhook(body({ event_id: "evt_c", payment_id: "pay_5", event_type: "payment.created" }))
    ).toMatchObject({
      event_id: "evt_c",
      status_mapped: "pending",
      event_type: "payment.created",
    })
  })

  it("derives the event type from a state field", () => {
    expect(decodeCheckoutWebhook(body({ payment_id: "pay_3", state: "refunded" }))).toMatchObject({
      status_mapped: "refunded",
      event_type: "payment.refunded",
    })
  })

  it.each([
    ["not json", Buffer.from("{", "utf8"), "Webhook body is not valid JSON."],
    ["an array body", body([1, 2]), "Malformed webhook payload."],
    ["no payment id", body({ status: "paid" }), "Webhook payload is missing payment_id."],
    ["an unknown event type", body({ payment_id: "pay_4", event_type: "payment.updated" }), "Webhook event type is not supported."],
  ])("rejects %s", (_label, raw, message) => {
    let thrown: unknown
    try {
      decodeCheckoutWebhook(raw)
    } catch (error) {
      thrown = error
    }

    expect(thrown).toMatchObject({
      code: CheckoutErrorCode.WEBHOOK_PAYLOAD_INVALID,
      httpStatus: 400,
      message,
    })
  })
})
