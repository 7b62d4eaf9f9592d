import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import sharp from 'sharp'
import type { DocumentInput, DocumentSource } from '../types.js'
import type { DocumentAiClient } from './documentAiClient.js'

export type IngestOptions = {
  signedUrlExpiryHours: number
  tempRoot?: string
}

function safeFileName(fileName: string) {
  const base = path.basename(String(fileName || '').trim())
  return base && base !== '.' && base !== '..' ? base : 'document.pdf'
}

/**
 * Writes the PDF to a private temp directory, uploads it for OCR and returns a
 * signed retrieval URL. The directory is removed on every exit path.
 */
export async function uploadPdfForOcr(
  client: DocumentAiClient,
  content: Buffer,
  fileName: string,
  options: IngestOptions
): Promise<string> {
  const tempDir = await mkdtemp(path.join(options.tempRoot || tmpdir(), 'resume-upload-'))
  const name = safeFileName(fileName)
  const tempPath = path.join(tempDir, name)

  try {
    await writeFile(tempPath, content)
    const uploaded = await client.uploadFile({ filePath: tempPath, fileName: name, purpose: 'ocr' })
    return await client.getSignedUrl(uploaded.id, options.signedUrlExpiryHours)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error('[resume-ingest] pdf upload failed', message)
    throw new Error(`Failed to upload PDF: ${message}`)
  } finally {
    await rm(tempDir, { recursive: true, force: true })
  }
}

export async function encodeImageAsDataUrl(content: Buffer): Promise<string> {
  let png: Buffer
  try {
    png = await sharp(content).png().toBuffer()
  } catch (error) {
    throw new Error(`INVALID_IMAGE: ${error instanceof Error ? error.message : String(error)}`)
  }
  return `data:image/png;base64,${png.toString('base64')}`
}

export async function toDocumentSource(
  client: DocumentAiClient,
  input: DocumentInput,
  options: IngestOptions
): Promise<DocumentSource> {
  if (input.kind === 'url') {
    return { type: 'document_url', documentUrl: input.url }
  }

  if (input.kind === 'pdf') {
    const documentUrl = await uploadPdfForOcr(client, input.content, input.fileName, options)
    return { type: 'document_url', documentUrl }
  }

  return { type: 'image_url', imageUrl: await encodeImageAsDataUrl(input.content) }
}
