import 'dotenv/config'
import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import process from 'node:process'
import { createInterface } from 'node:readline/promises'
import { parseArgs, readDocumentInput, readMode, resolveApiKey, wantsRawResponse } from '../src/cli/documentArgs.js'
import { loadServiceConfig } from '../src/config.js'
import { createDocumentAiClient } from '../src/services/documentAiClient.js'
import { ingestAndRunOcr } from '../src/services/ocrPipeline.js'
import { formatPagesForDisplay, joinPageTexts } from '../src/services/pageText.js'
import { extractResumeData } from '../src/services/resumeExtraction.js'
import {
  buildOcrArtifacts,
  buildRawOcrArtifact,
  buildResumeArtifacts,
  composeOcrEnvelope,
  composeResumeEnvelope,
  summarizeResume,
  type DownloadArtifact
} from '../src/services/resultComposer.js'

async function promptForApiKey(): Promise<string> {
  if (!process.stdin.isTTY) return ''
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    return (await rl.question('Mistral API key: ')).trim()
  } finally {
    rl.close()
  }
}

async function writeArtifacts(outDir: string, artifacts: DownloadArtifact[]) {
  await mkdir(outDir, { recursive: true })
  for (const artifact of artifacts) {
    const target = path.join(outDir, artifact.fileName)
    await writeFile(target, artifact.content, 'utf8')
    console.log(`[process-document] wrote ${target} (${artifact.mimeType})`)
  }
}

async function main() {
  const args = parseArgs(process.argv)
  const mode = readMode(args)
  const outDir = path.resolve(String(args.get('out') || '.'))

  const apiKey = await resolveApiKey(args, process.env, promptForApiKey)
  if (!apiKey) {
    console.warn('[process-document] Enter an API key to continue (--api-key or MISTRAL_API_KEY)')
    process.exitCode = 1
    return
  }

  const config = loadServiceConfig(process.env, { apiKey })
  const client = createDocumentAiClient({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    ocrModel: config.ocrModel,
    chatModel: config.chatModel
  })

  const input = await readDocumentInput(args)
  console.log(`[process-document] extracting content from ${input.kind} input...`)
  const ocr = await ingestAndRunOcr(client, input, { signedUrlExpiryHours: config.signedUrlExpiryHours })
  if (!ocr.ok) {
    console.warn('[process-document] No content extracted.')
    process.exitCode = 1
    return
  }

  if (wantsRawResponse(args)) {
    await writeArtifacts(outDir, [buildRawOcrArtifact(ocr.raw)])
  }

  if (mode === 'ocr') {
    const envelope = composeOcrEnvelope({ pages: ocr.pages, inputType: input.kind })
    console.log(formatPagesForDisplay(ocr.pages, 'markdown'))
    await writeArtifacts(outDir, buildOcrArtifacts(ocr.pages, envelope))
    return
  }

  const extractedText = joinPageTexts(ocr.pages)
  console.log('[process-document] analyzing and structuring resume data...')
  const extraction = await extractResumeData(client, extractedText)
  if (!extraction.ok) {
    console.warn(`[process-document] could not structure the resume (${extraction.reason}); writing the empty template`)
  }

  const envelope = composeResumeEnvelope({
    resume: extraction.resume,
    inputType: input.kind,
    fileName: input.kind === 'url' ? null : input.fileName,
    totalPages: ocr.pages.length
  })
  const summary = summarizeResume(extraction.resume, extractedText)

  console.log(`Name: ${extraction.resume.basics.name || '(not found)'}`)
  for (const [section, count] of Object.entries(summary.sections)) {
    console.log(`  ${section}: ${count}`)
  }
  console.log(`  skills: ${summary.skillCount}`)
  console.log(`  words: ${summary.wordCount}`)

  await writeArtifacts(outDir, buildResumeArtifacts(envelope, extractedText))
}

main().catch((error: unknown) => {
  console.error('[process-document] failed:', error instanceof Error ? error.message : error)
  process.exit(1)
})
