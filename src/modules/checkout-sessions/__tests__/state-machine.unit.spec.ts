import {
  applyTransition,
  canTransition,
  isTerminalStatus,
  parseSessionStatus,
} from "../../../../payments/stateMachine"
import { CheckoutErrorCode, SessionStatus } from "../../../../payments/types"
import {
  isSettledSessionStatus,
  isSuccessfulSessionStatus,
  mapProviderStatus,
  statusFromEventType,
  transitionSessionStatus,
} from "../state-machine"

const ALL_STATUSES = Object.values(SessionStatus)

describe("session state machine", () => {
  it("allows exactly the documented forward moves", () => {
    const allowed = ALL_STATUSES.flatMap((from) =>
      ALL_STATUSES.filter((to) => from !== to && canTransition(from, to)).map(
        (to) => `${from}->${to}`
      )
    )

    expect(allowed.sort()).toEqual([
      "paid->refunded",
      "pending->cancelled",
      "pending->failed",
      "pending->paid",
    ])
  })

  it("treats failed, cancelled and refunded as terminal", () => {
    expect(ALL_STATUSES.filter((status) => isTerminalStatus(status)).sort()).toEqual([
      "cancelled",
      "failed",
      "refunded",
    ])
  })

  it("reports a same-status move as an idempotent no-op", () => {
    expect(applyTransition(SessionStatus.PAID, SessionStatus.PAID)).toEqual({
      from: "paid",
      to: "paid",
      changed: false,
      idempotent: true,
      valid: true,
    })
  })

  it("throws STATE_TRANSITION_INVALID unless asked for a no-op", () => {
    let thrown: unknown
    try {
      applyTransition(SessionStatus.FAILED, SessionStatus.PAID, {
        correlation_id: "corr_sm_1",
      })
    } catch (error) {
      thrown = error
    }

    expect(thrown).toMatchObject({
      code: CheckoutErrorCode.STATE_TRANSITION_INVALID,
      httpStatus: 409,
      details: { from: "failed", to: "paid", correlation_id: "corr_sm_1" },
    })

    expect(
      transitionSessionStatus({
        current: SessionStatus.REFUNDED,
        next: SessionStatus.PAID,
        correlation_id: "corr_sm_2",
        on_invalid: "noop",
      })
    ).toEqual({
      current: "refunded",
      next: "refunded",
      changed: false,
      idempotent: false,
      valid: false,
    })
  })

  it("never leaves a terminal status through any sequence of requests", () => {
    for (const terminal of [SessionStatus.FAILED, SessionStatus.CANCELLED, SessionStatus.REFUNDED]) {
      let current: SessionStatus = terminal
      for (const next of [...ALL_STATUSES, ...ALL_STATUSES.slice().reverse()]) {
        current = transitionSessionStatus({
          current,
          next,
          correlation_id: "corr_sm_3",
          on_invalid: "noop",
        }).next
      }

      expect(current).toBe(terminal)
    }
  })

  it("parses canonical names and the US spelling of cancelled", () => {
    expect(parseSessionStatus(" PAID ")).toBe("paid")
    expect(parseSessionStatus("canceled")).toBe("cancelled")
    expect(parseSessionStatus("succeeded")).toBeNull()
    expect(parseSessionStatus(42)).toBeNull()
  })

  it("maps provider vocabulary onto session statuses", () => {
    expect(mapProviderStatus("SUCCEEDED")).toBe("paid")
    expect(mapProviderStatus("captured")).toBe("paid")
    expect(mapProviderStatus("declined")).toBe("failed")
    expect(mapProviderStatus("expired")).toBe("cancelled")
    expect(mapProviderStatus("refunded")).toBe("refunded")
    expect(mapProviderStatus("processing")).toBe("pending")
    expect(mapProviderStatus(undefined)).toBe("pending")
  })

  it("reads the status from an event type suffix", () => {
    expect(statusFromEventType("payment.succeeded")).toBe("paid")
    expect(statusFromEventType("checkout.session.canceled")).toBe("cancelled")
    expect(statusFromEventType("refunded")).toBe("refunded")
    expect(statusFromEventType("payment.created")).toBe("pending")
    expect(statusFromEventType("checkout.session.requires_action")).toBe("pending")
    expect(statusFromEventType("payment.updated")).toBeNull()
    expect(statusFromEventType("")).toBeNull()
  })

  it("describes settled and successful statuses", () => {
    expect(isSettledSessionStatus(SessionStatus.PENDING)).toBe(false)
    expect(isSettledSessionStatus(SessionStatus.PAID)).toBe(true)
    expect(isSuccessfulSessionStatus(SessionStatus.PAID)).toBe(true)
    expect(isSuccessfulSessionStatus(SessionStatus.REFUNDED)).toBe(false)
  })
})
