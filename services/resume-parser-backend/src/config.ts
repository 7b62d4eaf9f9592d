const DEFAULT_BASE_URL = 'https://api.mistral.ai'
const DEFAULT_OCR_MODEL = 'mistral-ocr-latest'
const DEFAULT_CHAT_MODEL = 'mistral-large-latest'
const DEFAULT_PORT = 8000
const DEFAULT_UPLOAD_MAX_BYTES = 20 * 1024 * 1024
const DEFAULT_SIGNED_URL_EXPIRY_HOURS = 24

export type ServiceConfig = {
  apiKey: string
  baseUrl: string
  ocrModel: string
  chatModel: string
  port: number
  corsOrigins: string[]
  uploadMaxBytes: number
  signedUrlExpiryHours: number
}

type Env = Record<string, string | undefined>

export function normalizeBaseUrl(value: string): string {
  return value.endsWith('/') ? value.slice(0, -1) : value
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const value = Number(String(raw || '').trim())
  return Number.isFinite(value) && value > 0 ? value : fallback
}

export function readApiKey(env: Env = process.env): string {
  return String(env.MISTRAL_API_KEY || '').trim()
}

export function loadServiceConfig(env: Env = process.env, overrides: { apiKey?: string } = {}): ServiceConfig {
  const apiKey = String(overrides.apiKey || '').trim() || readApiKey(env)
  if (!apiKey) {
    throw new Error('MISTRAL_API_KEY_MISSING')
  }

  const corsOrigins = String(env.CORS_ORIGINS || '').split(',').map((item) => item.trim()).filter(Boolean)

  return {
    apiKey,
    baseUrl: normalizeBaseUrl(String(env.MISTRAL_BASE_URL || '').trim() || DEFAULT_BASE_URL),
    ocrModel: String(env.OCR_MODEL || '').trim() || DEFAULT_OCR_MODEL,
    chatModel: String(env.CHAT_MODEL || '').trim() || DEFAULT_CHAT_MODEL,
    port: positiveNumber(env.PORT, DEFAULT_PORT),
    corsOrigins: corsOrigins.length ? corsOrigins : ['*'],
    uploadMaxBytes: positiveNumber(env.UPLOAD_MAX_BYTES, DEFAULT_UPLOAD_MAX_BYTES),
    signedUrlExpiryHours: positiveNumber(env.SIGNED_URL_EXPIRY_HOURS, DEFAULT_SIGNED_URL_EXPIRY_HOURS)
  }
}
