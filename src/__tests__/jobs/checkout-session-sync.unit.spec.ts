import { createMedusaContainer } from "@medusajs/framework/utils"
import checkoutSessionSyncJob, { config } from "../../jobs/checkout-session-sync"
import { getCheckoutSessionService } from "../../modules/checkout-sessions"

const mockSyncStaleSessions = jest.fn(async () => ({
  scanned: 0,
  candidates: 0,
  updated: 0,
  unchanged: 0,
  failed: 0,
}))

jest.mock("../../modules/checkout-sessions", () => ({
  ...jest.requireActual("../../modules/checkout-sessions"),
  getCheckoutSessionService: jest.fn(() => ({ syncStaleSessions: mockSyncStaleSessions })),
}))

describe("checkout session sync job", () => {
  afterEach(() => {
    jest.clearAllMocks()
  })

  it("syncs stale sessions through the container's service", async () => {
    const container = createMedusaContainer()

    await checkoutSessionSyncJob(container)

    expect(getCheckoutSessionService).toHaveBeenCalledWith(container)
    expect(mockSyncStaleSessions).toHaveBeenCalledTimes(1)
  })

  it("exposes deterministic job metadata", () => {
    expect(config.name).toBe("checkout-session-sync")
    expect(config.schedule).toBe("*/20 * * * *")
  })

  it("lets a failed run reach the scheduler", async () => {
    mockSyncStaleSessions.mockRejectedValueOnce(new Error("store unavailable"))

    await expect(checkoutSessionSyncJob(createMedusaContainer())).rejects.toThrow("store unavailable")
  })
})
