import test from 'node:test'
import assert from 'node:assert/strict'
import sharp from 'sharp'
import { fileForm, startTestApp } from '../testing/httpHarness.js'
import { createStubClient } from '../testing/stubClient.js'
import { createEmptyResume } from '../services/resumeSchema.js'

type ErrorBody = { code: string; message: string }

async function post(baseUrl: string, route: string, body: FormData | string, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${route}`, { method: 'POST', body, headers })
}

test('GET / describes the service', async () => {
  const { client } = createStubClient()
  const app = await startTestApp(client)
  try {
    const resp = await fetch(`${app.baseUrl}/`)
    const body = await resp.json() as { message: string; status: string; version: string; endpoints: Record<string, string> }
    assert.equal(resp.status, 200)
    assert.equal(body.message, 'AI Resume Parser API')
    assert.equal(body.status, 'active')
    assert.equal(body.version, '1.0.0')
    assert.deepEqual(Object.keys(body.endpoints), ['parse_resume', 'ocr', 'health'])
  } finally {
    await app.close()
  }
})

test('GET /health reports key configuration', async () => {
  const { client } = createStubClient()
  const app = await startTestApp(client)
  try {
    const resp = await fetch(`${app.baseUrl}/health`)
    const body = await resp.json() as { status: string; timestamp: string; api_key_configured: boolean }
    assert.equal(resp.status, 200)
    assert.equal(body.status, 'healthy')
    assert.equal(body.api_key_configured, true)
    assert.ok(!Number.isNaN(Date.parse(body.timestamp)))
  } finally {
    await app.close()
  }
})

test('unsupported extensions are rejected before any remote call', async () => {
  const { client, calls } = createStubClient({ pages: ['never used'] })
  const app = await startTestApp(client)
  try {
    for (const fileName of ['resume.docx', 'resume.txt', 'resume']) {
      const resp = await post(app.baseUrl, '/parse-resume', fileForm(fileName, 'content'))
      const body = await resp.json() as ErrorBody
      assert.equal(resp.status, 400)
      assert.equal(body.code, 'UNSUPPORTED_FILE_TYPE')
    }
    assert.equal(calls.uploadFile.length, 0)
    assert.equal(calls.processOcr.length, 0)
    assert.equal(calls.completeChat.length, 0)
  } finally {
    await app.close()
  }
})

test('unsupported extension message lists the allowed ones', async () => {
  const { client } = createStubClient()
  const app = await startTestApp(client)
  try {
    const resp = await post(app.baseUrl, '/parse-resume', fileForm('cv.DOCX', 'content'))
    assert.deepEqual(await resp.json(), {
      code: 'UNSUPPORTED_FILE_TYPE',
      message: 'Unsupported file extension: .docx. Allowed: .pdf, .png, .jpg, .jpeg'
    })
  } finally {
    await app.close()
  }
})

test('empty uploads and missing files return 422', async () => {
  const { client, calls } = createStubClient()
  const app = await startTestApp(client)
  try {
    const empty = await post(app.baseUrl, '/parse-resume', fileForm('cv.pdf', Buffer.alloc(0)))
    assert.equal(empty.status, 422)
    assert.deepEqual(await empty.json(), { code: 'EMPTY_FILE', message: 'File appears to be empty' })

    const noFileForm = new FormData()
    noFileForm.append('note', 'no file here')
    const missing = await post(app.baseUrl, '/parse-resume', noFileForm)
    assert.equal(missing.status, 422)
    assert.deepEqual(await missing.json(), { code: 'VALIDATION_ERROR', message: 'File is required' })

    const notMultipart = await post(app.baseUrl, '/parse-resume', '{}', { 'Content-Type': 'application/json' })
    assert.equal(notMultipart.status, 422)
    assert.equal((await notMultipart.json() as ErrorBody).code, 'VALIDATION_ERROR')

    assert.equal(calls.processOcr.length, 0)
  } finally {
    await app.close()
  }
})

test('uploads over the size limit return 413', async () => {
  const { client, calls } = createStubClient()
  const app = await startTestApp(client, { uploadMaxBytes: 16 })
  try {
    const resp = await post(app.baseUrl, '/parse-resume', fileForm('cv.pdf', Buffer.alloc(64, 1)))
    assert.equal(resp.status, 413)
    assert.equal((await resp.json() as ErrorBody).code, 'UPLOAD_TOO_LARGE')
    assert.equal(calls.uploadFile.length, 0)
  } finally {
    await app.close()
  }
})

test('an empty OCR result returns 400 and skips extraction', async () => {
  const { client, calls } = createStubClient({ pages: [] })
  const app = await startTestApp(client)
  try {
    const resp = await post(app.baseUrl, '/parse-resume', fileForm('cv.pdf', '%PDF-1.4'))
    assert.equal(resp.status, 400)
    assert.deepEqual(await resp.json(), { code: 'OCR_EMPTY', message: 'No content could be extracted from the document' })
    assert.equal(calls.processOcr.length, 1)
    assert.equal(calls.completeChat.length, 0)
  } finally {
    await app.close()
  }
})

test('remote failures return 500 with the error message', async () => {
  const { client } = createStubClient({ ocrError: new Error('OCR_FAILED: 503 unavailable') })
  const app = await startTestApp(client)
  try {
    const resp = await post(app.baseUrl, '/parse-resume', fileForm('cv.pdf', '%PDF-1.4'))
    assert.equal(resp.status, 500)
    assert.deepEqual(await resp.json(), { code: 'PROCESSING_ERROR', message: 'Processing error: OCR_FAILED: 503 unavailable' })
  } finally {
    await app.close()
  }
})

test('upload failures return 500 with the wrapped message', async () => {
  const { client, calls } = createStubClient({ uploadError: new Error('FILE_UPLOAD_FAILED: 401 unauthorized') })
  const app = await startTestApp(client)
  try {
    const resp = await post(app.baseUrl, '/parse-resume', fileForm('cv.pdf', '%PDF-1.4'))
    assert.equal(resp.status, 500)
    assert.deepEqual(await resp.json(), {
      code: 'PROCESSING_ERROR',
      message: 'Processing error: Failed to upload PDF: FILE_UPLOAD_FAILED: 401 unauthorized'
    })
    assert.equal(calls.processOcr.length, 0)
  } finally {
    await app.close()
  }
})

test('unparseable model output still returns 200 with the empty resume', async () => {
  const { client } = createStubClient({ pages: ['Jane Doe'], chatResponse: 'not json' })
  const app = await startTestApp(client)
  try {
    const resp = await post(app.baseUrl, '/parse-resume', fileForm('cv.pdf', '%PDF-1.4'))
    const body = await resp.json() as { resume: unknown }
    assert.equal(resp.status, 200)
    assert.deepEqual(body.resume, createEmptyResume())
  } finally {
    await app.close()
  }
})

test('image uploads are sent to OCR as a png data url', async () => {
  const jpeg = await sharp({
    create: { width: 2, height: 2, channels: 3, background: { r: 0, g: 0, b: 255 } }
  }).jpeg().toBuffer()
  const { client, calls } = createStubClient({ pages: ['Jane Doe'], chatResponse: '{"basics":{"name":"Jane Doe"}}' })
  const app = await startTestApp(client)
  try {
    const resp = await post(app.baseUrl, '/parse-resume', fileForm('scan.JPG', jpeg))
    const body = await resp.json() as { metadata: { input_type: string; filename: string }; resume: { basics: { name: string } } }
    assert.equal(resp.status, 200)
    assert.equal(body.metadata.input_type, 'image')
    assert.equal(body.metadata.filename, 'scan')
    assert.equal(body.resume.basics.name, 'Jane Doe')
    assert.equal(calls.uploadFile.length, 0)

    const source = calls.processOcr[0]
    assert.equal(source?.type, 'image_url')
    assert.ok(source?.type === 'image_url' && source.imageUrl.startsWith('data:image/png;base64,'))
  } finally {
    await app.close()
  }
})

test('POST /ocr accepts a url field and returns page stats', async () => {
  const { client, calls } = createStubClient({ pages: ['hello world', 'second page'] })
  const app = await startTestApp(client)
  try {
    const form = new FormData()
    form.append('url', 'https://docs.example.test/cv.pdf')
    const resp = await post(app.baseUrl, '/ocr', form)
    const body = await resp.json() as {
      metadata: { input_type: string; total_pages: number; processor: string }
      content: { full_text: string; pages: Array<{ page_number: number; word_count: number }> }
    }

    assert.equal(resp.status, 200)
    assert.deepEqual(calls.processOcr, [{ type: 'document_url', documentUrl: 'https://docs.example.test/cv.pdf' }])
    assert.equal(body.metadata.input_type, 'url')
    assert.equal(body.metadata.total_pages, 2)
    assert.equal(body.metadata.processor, 'Mistral OCR API')
    assert.equal(body.content.full_text, 'Page 1\nhello world\n\nPage 2\nsecond page')
    assert.deepEqual(body.content.pages.map((page) => [page.page_number, page.word_count]), [[1, 2], [2, 2]])
    assert.equal(calls.completeChat.length, 0)
  } finally {
    await app.close()
  }
})

test('POST /ocr rejects malformed urls', async () => {
  const { client, calls } = createStubClient()
  const app = await startTestApp(client)
  try {
    const form = new FormData()
    form.append('url', 'not a url')
    const resp = await post(app.baseUrl, '/ocr', form)
    assert.equal(resp.status, 400)
    assert.equal((await resp.json() as ErrorBody).code, 'INVALID_URL')
    assert.equal(calls.processOcr.length, 0)
  } finally {
    await app.close()
  }
})
