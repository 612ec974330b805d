import { SessionStatus, type SessionRecord } from "../../../../payments/types"

export function makeLogger() {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }
}

/** Parsed JSON lines a jest.fn logger received for one event name. */
export function loggedEvents(
  logger: ReturnType<typeof makeLogger>,
  message: string
): Array<Record<string, unknown>> {
  const calls = [
    ...logger.info.mock.calls,
    ...logger.warn.mock.calls,
    ...logger.error.mock.calls,
    ...logger.debug.mock.calls,
  ]

  return calls
    .map((call): unknown => JSON.parse(String(call[0])))
    .filter((entry): entry is Record<string, unknown> =>
      typeof entry === "object" && entry !== null && Reflect.get(entry, "message") === message
    )
}

export function makeSessionRecord(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id: "ses_1",
    payment_id: "pay_1",
    provider_key: "dummy",
    amount: "19.99",
    currency: "USD",
    status: SessionStatus.PENDING,
    raw_provider_payload: {},
    redirect_url: null,
    metadata: {},
    created_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  }
}
