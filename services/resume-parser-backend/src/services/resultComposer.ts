import type { InputType, OcrPage } from '../types.js'
import { countWords, formatPagesForDisplay } from './pageText.js'
import type { ResumeListSection, ResumeRecord } from './resumeSchema.js'

export const RESUME_PROCESSOR_LABEL = 'Mistral AI Resume Parser'
export const OCR_PROCESSOR_LABEL = 'Mistral OCR API'

export type ResumeEnvelope = {
  metadata: {
    extraction_timestamp: string
    input_type: InputType
    filename?: string
    total_pages: number
    processor: string
  }
  resume: ResumeRecord
}

export type OcrPageSummary = {
  page_number: number
  text: string
  word_count: number
}

export type OcrEnvelope = {
  metadata: {
    extraction_timestamp: string
    input_type: InputType
    total_pages: number
    processor: string
  }
  content: {
    full_text: string
    pages: OcrPageSummary[]
  }
}

export type DownloadArtifact = {
  fileName: string
  mimeType: string
  content: string
}

export type ResumeSummary = {
  sections: Record<ResumeListSection, number>
  skillCount: number
  wordCount: number
}

export function stripExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.')
  return dot >= 0 ? fileName.slice(0, dot) : fileName
}

export function composeResumeEnvelope(params: {
  resume: ResumeRecord
  inputType: InputType
  fileName?: string | null
  totalPages: number
  now?: Date
}): ResumeEnvelope {
  const metadata: ResumeEnvelope['metadata'] = {
    extraction_timestamp: (params.now ?? new Date()).toISOString(),
    input_type: params.inputType,
    total_pages: params.totalPages,
    processor: RESUME_PROCESSOR_LABEL
  }
  if (params.fileName) {
    metadata.filename = stripExtension(params.fileName)
  }
  return { metadata, resume: params.resume }
}

export function composeOcrEnvelope(params: {
  pages: readonly OcrPage[]
  inputType: InputType
  now?: Date
}): OcrEnvelope {
  return {
    metadata: {
      extraction_timestamp: (params.now ?? new Date()).toISOString(),
      input_type: params.inputType,
      total_pages: params.pages.length,
      processor: OCR_PROCESSOR_LABEL
    },
    content: {
      full_text: formatPagesForDisplay(params.pages, 'text'),
      pages: params.pages.map((page, idx) => ({
        page_number: idx + 1,
        text: page.markdown,
        word_count: countWords(page.markdown)
      }))
    }
  }
}

export function toPrettyJson(value: unknown): string {
  return JSON.stringify(value, null, 2)
}

export function buildOcrArtifacts(pages: readonly OcrPage[], envelope: OcrEnvelope): DownloadArtifact[] {
  return [
    { fileName: 'extracted_content.txt', mimeType: 'text/plain', content: formatPagesForDisplay(pages, 'text') },
    { fileName: 'extracted_content.md', mimeType: 'text/markdown', content: formatPagesForDisplay(pages, 'markdown') },
    { fileName: 'extracted_content.json', mimeType: 'application/json', content: toPrettyJson(envelope) }
  ]
}

// Untouched OCR response body, for inspecting what the service actually sent.
export function buildRawOcrArtifact(raw: unknown): DownloadArtifact {
  return { fileName: 'ocr_response_raw.json', mimeType: 'application/json', content: toPrettyJson(raw) }
}

export function buildResumeArtifacts(envelope: ResumeEnvelope, extractedText: string): DownloadArtifact[] {
  return [
    { fileName: 'resume_data.json', mimeType: 'application/json', content: toPrettyJson(envelope) },
    { fileName: 'extracted_text.txt', mimeType: 'text/plain', content: extractedText }
  ]
}

// Display-only aggregates; never merged into an envelope.
export function summarizeResume(resume: ResumeRecord, extractedText: string): ResumeSummary {
  const sections: Record<ResumeListSection, number> = {
    work: resume.work.length,
    education: resume.education.length,
    projects: resume.projects.length,
    volunteer: resume.volunteer.length,
    awards: resume.awards.length,
    certificates: resume.certificates.length,
    publications: resume.publications.length,
    languages: resume.languages.length,
    interests: resume.interests.length,
    references: resume.references.length
  }

  const skillCount = Object.values(resume.skills).reduce((total, list) => total + list.length, 0)

  return {
    sections,
    skillCount,
    wordCount: countWords(extractedText)
  }
}
