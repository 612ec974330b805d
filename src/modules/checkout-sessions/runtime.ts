import { ContainerRegistrationKeys } from "@medusajs/framework/utils"
import type { ICheckoutProvider } from "../../../payments/provider"
import { logEvent } from "../logging/log-event"
import { loadCheckoutConfig, type CheckoutConfig } from "./config"
import type { PgConnectionLike } from "./pg-session-model"
import { createCheckoutSessionService, type CheckoutSessionService } from "./service"

type ScopeLike = {
  resolve: (key: string) => unknown
}

type RuntimeOverrides = {
  config?: CheckoutConfig
  providers?: ICheckoutProvider[]
  pg?: PgConnectionLike | null
}

let cachedService: CheckoutSessionService | null = null
let overrides: RuntimeOverrides = {}

function isScopeLike(value: unknown): value is ScopeLike {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "resolve") === "function"
  )
}

export function isPgConnectionLike(value: unknown): value is PgConnectionLike {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "raw") === "function"
  )
}

function resolvePgConnection(scope: unknown): PgConnectionLike | null {
  if (!isScopeLike(scope)) {
    return null
  }

  let resolved: unknown
  try {
    resolved = scope.resolve(ContainerRegistrationKeys.PG_CONNECTION)
  } catch {
    // Not registered outside a full Medusa boot.
    return null
  }

  return isPgConnectionLike(resolved) ? resolved : null
}

/**
 * The process-wide service. Built on first use from the environment; the
 * database connection is only looked up when session tables are configured.
 */
export function getCheckoutSessionService(scope?: unknown): CheckoutSessionService {
  if (cachedService) {
    return cachedService
  }

  const config = overrides.config ?? loadCheckoutConfig()
  const pg =
    overrides.pg !== undefined
      ? overrides.pg
      : config.session_tables.length
        ? resolvePgConnection(scope)
        : null

  cachedService = createCheckoutSessionService({
    config,
    pg,
    providers: overrides.providers,
    scopeOrLogger: scope,
  })

  logEvent(
    "CHECKOUT_SERVICE_READY",
    {
      providers: cachedService.providers.listKeys(),
      models: cachedService.listModels(),
      webhook_secret_configured: Boolean(config.webhook_secret),
    },
    undefined,
    { scopeOrLogger: scope }
  )

  return cachedService
}

/** Replaces what the next `getCheckoutSessionService` call builds from. */
export function configureCheckoutRuntime(next: RuntimeOverrides): void {
  overrides = { ...next }
  cachedService = null
}

export function resetCheckoutRuntime(): void {
  overrides = {}
  cachedService = null
}
