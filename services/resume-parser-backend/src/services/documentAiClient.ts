import { openAsBlob } from 'node:fs'
import { normalizeBaseUrl } from '../config.js'
import type { DocumentSource, OcrResponse } from '../types.js'

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export type DocumentAiClientConfig = {
  baseUrl: string
  apiKey: string
  ocrModel: string
  chatModel: string
  fetchImpl?: FetchLike
}

export type ChatCompletionParams = {
  prompt: string
  temperature: number
  maxTokens: number
}

// Single handle for every remote call. Built once per process and passed to
// the pipeline steps, so tests can swap in a stub with the same shape.
export type DocumentAiClient = {
  uploadFile(params: { filePath: string; fileName: string; purpose: 'ocr' }): Promise<{ id: string }>
  getSignedUrl(fileId: string, expiryHours: number): Promise<string>
  processOcr(source: DocumentSource): Promise<OcrResponse>
  completeChat(params: ChatCompletionParams): Promise<string>
}

function toWireDocument(source: DocumentSource) {
  if (source.type === 'document_url') {
    return { type: 'document_url', document_url: source.documentUrl }
  }
  return { type: 'image_url', image_url: source.imageUrl }
}

export function extractTextFromChatContent(content: unknown): string {
  if (typeof content === 'string') return content.trim()
  if (!Array.isArray(content)) return ''

  const lines = content
    .map((part: unknown) => {
      if (!part || typeof part !== 'object' || !('text' in part)) return ''
      return typeof part.text === 'string' ? part.text : ''
    })
    .filter(Boolean)

  return lines.join('\n').trim()
}

async function readFailure(code: string, resp: Response): Promise<Error> {
  const body = await resp.text().catch(() => '')
  return new Error(`${code}: ${resp.status} ${body}`.trim())
}

export function createDocumentAiClient(config: DocumentAiClientConfig): DocumentAiClient {
  const baseUrl = normalizeBaseUrl(String(config.baseUrl || '').trim())
  const apiKey = String(config.apiKey || '').trim()
  const fetchImpl: FetchLike = config.fetchImpl ?? ((url, init) => fetch(url, init))

  if (!baseUrl || !apiKey) {
    throw new Error('DOCUMENT_AI_CONFIG_INCOMPLETE')
  }

  const authHeader = { Authorization: `Bearer ${apiKey}` }
  const jsonHeaders = { ...authHeader, 'Content-Type': 'application/json' }

  return {
    async uploadFile({ filePath, fileName, purpose }) {
      const form = new FormData()
      form.append('purpose', purpose)
      form.append('file', await openAsBlob(filePath), fileName)

      const resp = await fetchImpl(`${baseUrl}/v1/files`, {
        method: 'POST',
        headers: authHeader,
        body: form
      })
      if (!resp.ok) throw await readFailure('FILE_UPLOAD_FAILED', resp)

      const body = await resp.json() as { id?: unknown }
      if (typeof body.id !== 'string' || !body.id) {
        throw new Error('FILE_UPLOAD_FAILED: missing file id')
      }
      return { id: body.id }
    },

    async getSignedUrl(fileId, expiryHours) {
      const url = `${baseUrl}/v1/files/${encodeURIComponent(fileId)}/url?expiry=${encodeURIComponent(String(expiryHours))}`
      const resp = await fetchImpl(url, { method: 'GET', headers: authHeader })
      if (!resp.ok) throw await readFailure('SIGNED_URL_FAILED', resp)

      const body = await resp.json() as { url?: unknown }
      if (typeof body.url !== 'string' || !body.url) {
        throw new Error('SIGNED_URL_FAILED: missing url')
      }
      return body.url
    },

    async processOcr(source) {
      const resp = await fetchImpl(`${baseUrl}/v1/ocr`, {
        method: 'POST',
        headers: jsonHeaders,
        body: JSON.stringify({
          model: config.ocrModel,
          document: toWireDocument(source),
          include_image_base64: true
        })
      })
      if (!resp.ok) throw await readFailure('OCR_FAILED', resp)

      const raw: unknown = await resp.json()
      const listed = raw && typeof raw === 'object' && 'pages' in raw ? raw.pages : null
      const pages = Array.isArray(listed) ? listed : []

      const normalized = pages
        .filter((page: unknown): page is { index?: unknown; markdown?: unknown } => Boolean(page) && typeof page === 'object')
        .map((page, position) => ({
          index: typeof page.index === 'number' ? page.index : position,
          markdown: typeof page.markdown === 'string' ? page.markdown : ''
        }))
        .sort((a, b) => a.index - b.index)
      return { pages: normalized, raw }
    },

    async completeChat({ prompt, temperature, maxTokens }) {
      const resp = await fetchImpl(`${baseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: jsonHeaders,
        body: JSON.stringify({
          model: config.chatModel,
          messages: [{ role: 'user', content: prompt }],
          temperature,
          max_tokens: maxTokens
        })
      })
      if (!resp.ok) throw await readFailure('MODEL_ERROR', resp)

      const body = await resp.json() as { choices?: Array<{ message?: { content?: unknown } }> }
      return extractTextFromChatContent(body.choices?.[0]?.message?.content)
    }
  }
}
