import crypto from "crypto"
import { InvalidSignatureError } from "./errors"

export const SIGNATURE_PREFIX = "sha256="
const DIGEST_BYTES = 32
const HEX_DIGEST_PATTERN = /^[0-9a-f]{64}$/i
const BASE64_DIGEST_PATTERN = /^[A-Za-z0-9+/]{43}=$/

export type HeaderBag = Record<string, string | string[] | undefined>

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : ""
}

function toBuffer(rawBody: Buffer | string): Buffer {
  return Buffer.isBuffer(rawBody) ? rawBody : Buffer.from(rawBody, "utf8")
}

/** Case-insensitive header lookup; repeated headers yield their first value. */
export function resolveHeader(headers: HeaderBag, name: string): string {
  const normalizedName = name.toLowerCase()

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== normalizedName) {
      continue
    }

    return readText(Array.isArray(value) ? value[0] : value)
  }

  return ""
}

export function computeWebhookDigest(rawBody: Buffer | string, secret: string): Buffer {
  return crypto.createHmac("sha256", secret).update(toBuffer(rawBody)).digest()
}

export function computeWebhookSignature(rawBody: Buffer | string, secret: string): string {
  return `${SIGNATURE_PREFIX}${computeWebhookDigest(rawBody, secret).toString("hex")}`
}

/**
 * Decodes `sha256=<hex>`, bare hex, or base64 into the raw digest bytes.
 */
function decodeSignature(header: string): Buffer | null {
  const value = header.toLowerCase().startsWith(SIGNATURE_PREFIX)
    ? header.slice(SIGNATURE_PREFIX.length).trim()
    : header

  if (HEX_DIGEST_PATTERN.test(value)) {
    return Buffer.from(value, "hex")
  }

  if (BASE64_DIGEST_PATTERN.test(value)) {
    const decoded = Buffer.from(value, "base64")
    return decoded.length === DIGEST_BYTES ? decoded : null
  }

  return null
}

/**
 * HMAC-SHA256 check of the raw request body. Throws InvalidSignatureError
 * for a missing secret, a missing or malformed header, or a mismatch.
 */
export function verifyWebhookSignature(
  rawBody: Buffer | string,
  signatureHeader: string | null | undefined,
  secret: string | null | undefined
): void {
  const normalizedSecret = readText(secret)
  if (!normalizedSecret) {
    throw new InvalidSignatureError("secret_not_configured")
  }

  const header = readText(signatureHeader)
  if (!header) {
    throw new InvalidSignatureError("signature_missing")
  }

  const provided = decodeSignature(header)
  if (!provided) {
    throw new InvalidSignatureError("signature_malformed")
  }

  const expected = computeWebhookDigest(rawBody, normalizedSecret)
  if (provided.length !== expected.length || !crypto.timingSafeEqual(provided, expected)) {
    throw new InvalidSignatureError("signature_mismatch")
  }
}

export function isValidWebhookSignature(
  rawBody: Buffer | string,
  signatureHeader: string | null | undefined,
  secret: string | null | undefined
): boolean {
  try {
    verifyWebhookSignature(rawBody, signatureHeader, secret)
    return true
  } catch (error) {
    if (error instanceof InvalidSignatureError) {
      return false
    }
    throw error
  }
}
