import type { DocumentInput, DocumentSource, OcrPage } from '../types.js'
import type { DocumentAiClient } from './documentAiClient.js'
import { toDocumentSource, type IngestOptions } from './documentIngest.js'

export type OcrResult =
  | { ok: true; pages: OcrPage[]; raw: unknown }
  | { ok: false; reason: 'OCR_EMPTY' }

export async function runDocumentOcr(client: DocumentAiClient, source: DocumentSource): Promise<OcrResult> {
  const { pages, raw } = await client.processOcr(source)
  if (pages.length === 0) {
    return { ok: false, reason: 'OCR_EMPTY' }
  }
  return { ok: true, pages, raw }
}

export async function ingestAndRunOcr(
  client: DocumentAiClient,
  input: DocumentInput,
  options: IngestOptions
): Promise<OcrResult> {
  const source = await toDocumentSource(client, input, options)
  return runDocumentOcr(client, source)
}
