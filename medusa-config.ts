import { loadEnv, defineConfig } from "@medusajs/framework/utils"
import { loadCheckoutConfig } from "./src/modules/checkout-sessions/config"
import { isAppError } from "./src/modules/observability/errors"

loadEnv(process.env.NODE_ENV || "development", process.cwd())

function assertCheckoutConfig(): void {
  try {
    loadCheckoutConfig(process.env)
  } catch (error) {
    console.error({
      event: "CHECKOUT_CONFIG_INVALID",
      reason: isAppError(error) ? error.message : String(error),
      details: isAppError(error) ? error.details ?? {} : {},
    })
    throw error
  }
}

assertCheckoutConfig()

export default defineConfig({
  projectConfig: {
    databaseUrl: process.env.DATABASE_URL,
    http: {
      storeCors: process.env.STORE_CORS || "http://localhost:8000",
      adminCors: process.env.ADMIN_CORS || "http://localhost:9000",
      authCors: process.env.AUTH_CORS || "http://localhost:9000",
      jwtSecret: process.env.JWT_SECRET || "supersecret",
      cookieSecret: process.env.COOKIE_SECRET || "supersecret",
    },
  },
})
