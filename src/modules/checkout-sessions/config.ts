import { z } from "zod"
import { CheckoutErrorCode } from "../../../payments/types"
import { ConfigurationError } from "./errors"
import { DEFAULT_PROVIDER_TIMEOUT_MS } from "./provider-router"
import { DEFAULT_MAX_SESSIONS, DEFAULT_STALE_MINUTES } from "./reconciliation"

export const DEFAULT_SIGNATURE_HEADER = "x-checkout-signature"
export const DEFAULT_SYNC_CRON = "*/20 * * * *"

export type CheckoutConfig = {
  webhook_secret: string | null
  signature_header: string
  default_provider: string | null
  dummy_provider_enabled: boolean
  provider_timeout_ms: number
  session_tables: string[]
  sync_stale_minutes: number
  sync_max_sessions: number
  sync_cron: string
  return_base_url: string | null
}

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

const optionalText = z
  .unknown()
  .transform((value) => readText(value))
  .transform((value) => value || null)

const positiveInt = (name: string, fallback: number) =>
  z
    .unknown()
    .transform((value) => readText(value))
    .pipe(
      z
        .string()
        .regex(/^\d*$/, `${name} must be a positive integer.`)
        .transform((value) => (value ? Number(value) : fallback))
        .pipe(z.number().int().positive(`${name} must be a positive integer.`))
    )

const booleanFlag = (name: string, fallback: boolean) =>
  z
    .unknown()
    .transform((value) => readText(value).toLowerCase())
    .pipe(
      z
        .enum(["", "true", "false", "1", "0", "yes", "no"], {
          errorMap: () => ({ message: `${name} must be true or false.` }),
        })
        .transform((value) => (value ? ["true", "1", "yes"].includes(value) : fallback))
    )

const checkoutEnvSchema = z.object({
  CHECKOUT_WEBHOOK_SECRET: optionalText,
  CHECKOUT_SIGNATURE_HEADER: optionalText.transform(
    (value) => value?.toLowerCase() ?? DEFAULT_SIGNATURE_HEADER
  ),
  CHECKOUT_DEFAULT_PROVIDER: optionalText.transform((value) => value?.toLowerCase() ?? null),
  CHECKOUT_DUMMY_PROVIDER: booleanFlag("CHECKOUT_DUMMY_PROVIDER", true),
  CHECKOUT_PROVIDER_TIMEOUT_MS: positiveInt(
    "CHECKOUT_PROVIDER_TIMEOUT_MS",
    DEFAULT_PROVIDER_TIMEOUT_MS
  ),
  CHECKOUT_SESSION_TABLES: z
    .unknown()
    .transform((value) =>
      readText(value)
        .split(",")
        .map((table) => table.trim().toLowerCase())
        .filter(Boolean)
    )
    .pipe(
      z.array(
        z
          .string()
          .regex(
            /^[a-z_][a-z0-9_]{0,62}$/,
            "CHECKOUT_SESSION_TABLES must list plain table names."
          )
      )
    ),
  CHECKOUT_SYNC_STALE_MINUTES: positiveInt("CHECKOUT_SYNC_STALE_MINUTES", DEFAULT_STALE_MINUTES),
  CHECKOUT_SYNC_MAX_SESSIONS: positiveInt("CHECKOUT_SYNC_MAX_SESSIONS", DEFAULT_MAX_SESSIONS),
  CHECKOUT_SYNC_CRON: optionalText.transform((value) => value ?? DEFAULT_SYNC_CRON),
  CHECKOUT_RETURN_BASE_URL: optionalText
    .pipe(z.string().url("CHECKOUT_RETURN_BASE_URL must be an absolute URL.").nullable())
    .transform((value) => value?.replace(/\/+$/, "") ?? null),
})

export function loadCheckoutConfig(
  env: Record<string, unknown> = process.env
): CheckoutConfig {
  const parsed = checkoutEnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new ConfigurationError(issue?.message ?? "Checkout configuration is invalid.", {
      code: CheckoutErrorCode.CHECKOUT_CONFIG_INVALID,
      httpStatus: 500,
      details: { field: issue?.path.join(".") ?? null },
      cause: parsed.error,
    })
  }

  const values = parsed.data
  const tables = Array.from(new Set(values.CHECKOUT_SESSION_TABLES))

  return {
    webhook_secret: values.CHECKOUT_WEBHOOK_SECRET,
    signature_header: values.CHECKOUT_SIGNATURE_HEADER,
    default_provider: values.CHECKOUT_DEFAULT_PROVIDER,
    dummy_provider_enabled: values.CHECKOUT_DUMMY_PROVIDER,
    provider_timeout_ms: values.CHECKOUT_PROVIDER_TIMEOUT_MS,
    session_tables: tables,
    sync_stale_minutes: values.CHECKOUT_SYNC_STALE_MINUTES,
    sync_max_sessions: values.CHECKOUT_SYNC_MAX_SESSIONS,
    sync_cron: values.CHECKOUT_SYNC_CRON,
    return_base_url: values.CHECKOUT_RETURN_BASE_URL,
  }
}
