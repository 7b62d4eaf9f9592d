import path from 'node:path'
import type { Request, Response } from 'express'
import { z } from 'zod'
import type { ServiceConfig } from '../config.js'
import { readMultipartForm, type MultipartForm, type UploadedFile } from '../middleware/upload.js'
import type { DocumentAiClient } from '../services/documentAiClient.js'
import { ingestAndRunOcr } from '../services/ocrPipeline.js'
import { joinPageTexts } from '../services/pageText.js'
import { extractResumeData } from '../services/resumeExtraction.js'
import { composeOcrEnvelope, composeResumeEnvelope } from '../services/resultComposer.js'
import type { DocumentInput } from '../types.js'

export const SERVICE_VERSION = '1.0.0'
export const ALLOWED_EXTENSIONS = ['.pdf', '.png', '.jpg', '.jpeg'] as const

export type RouteDeps = {
  client: DocumentAiClient
  config: Pick<ServiceConfig, 'apiKey' | 'uploadMaxBytes' | 'signedUrlExpiryHours'>
}

const documentUrlSchema = z.string().trim().url()

export function sendApiError(res: Response, status: number, code: string, message?: string) {
  return res.status(status).json({ code, message: message || code })
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error)
}

function fileExtension(fileName: string) {
  return path.extname(fileName.toLowerCase())
}

function isAllowedExtension(extension: string) {
  return ALLOWED_EXTENSIONS.some((allowed) => allowed === extension)
}

function toFileInput(file: UploadedFile): DocumentInput {
  if (fileExtension(file.fileName) === '.pdf') {
    return { kind: 'pdf', content: file.content, fileName: file.fileName }
  }
  return { kind: 'image', content: file.content, fileName: file.fileName }
}

// Shared upload checks. Returns null once a response has already been sent.
async function readUploadedDocument(req: Request, res: Response, deps: RouteDeps, options: { allowUrl: boolean }): Promise<{ input: DocumentInput; fileName: string | null } | null> {
  let form: MultipartForm
  try {
    form = await readMultipartForm(req, { maxFileBytes: deps.config.uploadMaxBytes })
  } catch (error) {
    const message = errorMessage(error)
    if (message === 'UPLOAD_TOO_LARGE') {
      sendApiError(res, 413, 'UPLOAD_TOO_LARGE', `File exceeds ${deps.config.uploadMaxBytes} bytes`)
      return null
    }
    sendApiError(res, 422, 'VALIDATION_ERROR', message)
    return null
  }

  const file = form.files.find((item) => item.fieldName === 'file')

  if (!file && options.allowUrl && form.fields.url) {
    const parsedUrl = documentUrlSchema.safeParse(form.fields.url)
    if (!parsedUrl.success) {
      sendApiError(res, 400, 'INVALID_URL', 'url must be an absolute URL')
      return null
    }
    return { input: { kind: 'url', url: parsedUrl.data }, fileName: null }
  }

  if (!file) {
    sendApiError(res, 422, 'VALIDATION_ERROR', options.allowUrl ? 'Provide a file or a url field' : 'File is required')
    return null
  }

  const extension = fileExtension(file.fileName)
  if (!isAllowedExtension(extension)) {
    sendApiError(res, 400, 'UNSUPPORTED_FILE_TYPE', `Unsupported file extension: ${extension || '(none)'}. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}`)
    return null
  }

  if (file.content.length === 0) {
    sendApiError(res, 422, 'EMPTY_FILE', 'File appears to be empty')
    return null
  }

  return { input: toFileInput(file), fileName: file.fileName }
}

export function getServiceInfo(_req: Request, res: Response) {
  return res.json({
    message: 'AI Resume Parser API',
    status: 'active',
    version: SERVICE_VERSION,
    description: 'Upload resume files (PDF/Image) and get structured JSON data',
    endpoints: {
      parse_resume: '/parse-resume (POST) - Upload resume file and get structured JSON',
      ocr: '/ocr (POST) - Upload a document or send a url and get page text',
      health: '/health (GET) - API health check'
    }
  })
}

export function createHealthHandler(deps: Pick<RouteDeps, 'config'>) {
  return (_req: Request, res: Response) => res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    api_key_configured: Boolean(deps.config.apiKey)
  })
}

export function createParseResumeHandler(deps: RouteDeps) {
  return async (req: Request, res: Response) => {
    const upload = await readUploadedDocument(req, res, deps, { allowUrl: false })
    if (!upload) return

    console.log(`[resume-api] processing file=${upload.fileName} as ${upload.input.kind}`)

    try {
      const ocr = await ingestAndRunOcr(deps.client, upload.input, { signedUrlExpiryHours: deps.config.signedUrlExpiryHours })
      if (!ocr.ok) {
        return sendApiError(res, 400, ocr.reason, 'No content could be extracted from the document')
      }

      const extraction = await extractResumeData(deps.client, joinPageTexts(ocr.pages))
      if (!extraction.ok) {
        console.warn(`[resume-api] extraction degraded to empty resume: ${extraction.reason}`)
      }

      const envelope = composeResumeEnvelope({
        resume: extraction.resume,
        inputType: upload.input.kind,
        fileName: upload.fileName,
        totalPages: ocr.pages.length
      })

      console.log(`[resume-api] completed file=${upload.fileName} pages=${ocr.pages.length}`)
      return res.json(envelope)
    } catch (error) {
      const message = errorMessage(error)
      console.error('[resume-api] processing failed', message)
      return sendApiError(res, 500, 'PROCESSING_ERROR', `Processing error: ${message}`)
    }
  }
}

export function createOcrHandler(deps: RouteDeps) {
  return async (req: Request, res: Response) => {
    const upload = await readUploadedDocument(req, res, deps, { allowUrl: true })
    if (!upload) return

    try {
      const ocr = await ingestAndRunOcr(deps.client, upload.input, { signedUrlExpiryHours: deps.config.signedUrlExpiryHours })
      if (!ocr.ok) {
        return sendApiError(res, 400, ocr.reason, 'No content could be extracted from the document')
      }

      return res.json(composeOcrEnvelope({ pages: ocr.pages, inputType: upload.input.kind }))
    } catch (error) {
      const message = errorMessage(error)
      console.error('[resume-api] ocr failed', message)
      return sendApiError(res, 500, 'PROCESSING_ERROR', `Processing error: ${message}`)
    }
  }
}
