import busboy from 'busboy'
import type { IncomingMessage } from 'node:http'

export type UploadedFile = {
  fieldName: string
  fileName: string
  mimeType: string
  content: Buffer
}

export type MultipartForm = {
  files: UploadedFile[]
  fields: Record<string, string>
}

export function isMultipartRequest(req: IncomingMessage) {
  return String(req.headers['content-type'] || '').toLowerCase().startsWith('multipart/form-data')
}

/**
 * Buffers a multipart/form-data body. Rejects with UPLOAD_TOO_LARGE when a file
 * exceeds `maxFileBytes` and INVALID_MULTIPART when the body cannot be parsed
 * or the client goes away before sending all of it.
 */
export function readMultipartForm(req: IncomingMessage, options: { maxFileBytes: number; maxFiles?: number }): Promise<MultipartForm> {
  return new Promise((resolve, reject) => {
    if (!isMultipartRequest(req)) {
      reject(new Error('INVALID_MULTIPART: expected multipart/form-data'))
      return
    }

    let parser: busboy.Busboy
    try {
      parser = busboy({
        headers: req.headers,
        limits: { fileSize: options.maxFileBytes, files: options.maxFiles ?? 1 }
      })
    } catch (error) {
      reject(new Error(`INVALID_MULTIPART: ${error instanceof Error ? error.message : String(error)}`))
      return
    }

    const pending: Array<{ fieldName: string; fileName: string; mimeType: string; chunks: Buffer[] }> = []
    const fields: Record<string, string> = {}
    let tooLarge = false
    let settled = false

    const settle = (outcome: () => void) => {
      if (settled) return
      settled = true
      outcome()
    }

    const abort = () => {
      settle(() => reject(new Error('INVALID_MULTIPART: request aborted')))
      req.unpipe(parser)
      parser.destroy()
    }

    parser.on('file', (fieldName, stream, info) => {
      const entry = {
        fieldName,
        fileName: String(info.filename || ''),
        mimeType: String(info.mimeType || ''),
        chunks: [] as Buffer[]
      }
      pending.push(entry)
      stream.on('data', (chunk: Buffer) => {
        entry.chunks.push(chunk)
      })
      stream.on('limit', () => {
        tooLarge = true
      })
      stream.on('error', (error) => {
        settle(() => reject(new Error(`INVALID_MULTIPART: ${error.message}`)))
      })
    })

    parser.on('field', (name, value) => {
      fields[name] = value
    })

    parser.on('error', (error) => {
      settle(() => reject(new Error(`INVALID_MULTIPART: ${error instanceof Error ? error.message : String(error)}`)))
    })

    parser.on('close', () => {
      if (tooLarge) {
        settle(() => reject(new Error('UPLOAD_TOO_LARGE')))
        return
      }
      settle(() => resolve({
        files: pending.map(({ chunks, ...file }) => ({ ...file, content: Buffer.concat(chunks) })),
        fields
      }))
    })

    req.on('error', abort)
    req.on('close', () => {
      if (!req.complete) abort()
    })

    req.pipe(parser)
  })
}
