import type { OcrPage } from '../types.js'

export const PAGE_SEPARATOR = '\n\n'

export type PageLabelStyle = 'markdown' | 'text'

export function joinPageTexts(pages: readonly Pick<OcrPage, 'markdown'>[]): string {
  return pages.map((page) => page.markdown).join(PAGE_SEPARATOR)
}

// Inverse of joinPageTexts for pages that contain no blank line of their own.
export function splitPageTexts(text: string): string[] {
  if (!text) return []
  return text.split(PAGE_SEPARATOR)
}

export function formatPagesForDisplay(pages: readonly Pick<OcrPage, 'markdown'>[], style: PageLabelStyle): string {
  return pages
    .map((page, idx) => {
      const label = style === 'markdown' ? `**Page ${idx + 1}**` : `Page ${idx + 1}`
      return `${label}\n${page.markdown}`
    })
    .join(PAGE_SEPARATOR)
}

export function countWords(text: string | null | undefined): number {
  const normalized = String(text || '').trim()
  if (!normalized) return 0
  return normalized.split(/\s+/).length
}
