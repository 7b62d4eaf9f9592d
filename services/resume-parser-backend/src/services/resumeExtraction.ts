import type { DocumentAiClient } from './documentAiClient.js'
import { buildResumeTemplate, createEmptyResume, normalizeResume, type ResumeRecord } from './resumeSchema.js'

export const RESUME_EXTRACTION_TEMPERATURE = 0.1
export const RESUME_EXTRACTION_MAX_TOKENS = 4000

export type ResumeParseFailure = 'INVALID_JSON' | 'NOT_AN_OBJECT'

export type ResumeParseResult =
  | { ok: true; resume: ResumeRecord }
  | { ok: false; reason: ResumeParseFailure; message: string }

export type ResumeExtraction =
  | { ok: true; resume: ResumeRecord }
  | { ok: false; reason: ResumeParseFailure | 'MODEL_ERROR'; message: string; resume: ResumeRecord }

const RESUME_TEMPLATE_JSON = JSON.stringify(buildResumeTemplate(), null, 2)

export function buildResumePrompt(extractedText: string): string {
  return [
    'You are an expert resume parser. Extract the following information from this resume text and return it as a structured JSON object.',
    'If any section is not found, include it with empty values but keep the structure.',
    '',
    'Resume text:',
    extractedText,
    '',
    'Structure the information into this exact JSON format:',
    RESUME_TEMPLATE_JSON,
    '',
    'Instructions:',
    '1. Extract all available information accurately',
    '2. Use consistent date formats (YYYY-MM or YYYY-MM-DD)',
    '3. For arrays, include all relevant items found',
    '4. If information is not available, use empty strings or empty arrays',
    '5. Be thorough in extracting highlights and descriptions',
    '6. Return ONLY the JSON object, no additional text'
  ].join('\n')
}

export function stripMarkdownFences(raw: string): string {
  const text = raw.trim()
  if (text.startsWith('```json')) {
    return text.replace(/```json/g, '').replace(/```/g, '').trim()
  }
  if (text.startsWith('```')) {
    return text.replace(/```/g, '').trim()
  }
  return text
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseResumeJson(raw: string): ResumeParseResult {
  const cleaned = stripMarkdownFences(raw)

  let parsed: unknown
  try {
    parsed = JSON.parse(cleaned)
  } catch (error) {
    return { ok: false, reason: 'INVALID_JSON', message: error instanceof Error ? error.message : String(error) }
  }

  if (!isPlainObject(parsed)) {
    return { ok: false, reason: 'NOT_AN_OBJECT', message: `Expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}` }
  }

  return { ok: true, resume: normalizeResume(parsed) }
}

/**
 * Runs the single chat completion that turns OCR text into a resume. Never
 * throws: model and parse failures come back as `ok: false` carrying the
 * empty resume.
 */
export async function extractResumeData(client: DocumentAiClient, extractedText: string): Promise<ResumeExtraction> {
  let responseText: string
  try {
    responseText = await client.completeChat({
      prompt: buildResumePrompt(extractedText),
      temperature: RESUME_EXTRACTION_TEMPERATURE,
      maxTokens: RESUME_EXTRACTION_MAX_TOKENS
    })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.error('[resume-extract] model call failed', message)
    return { ok: false, reason: 'MODEL_ERROR', message, resume: createEmptyResume() }
  }

  const result = parseResumeJson(responseText)
  if (!result.ok) {
    console.error(`[resume-extract] ${result.reason}`, result.message)
    return { ...result, resume: createEmptyResume() }
  }

  return result
}
