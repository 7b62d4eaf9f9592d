import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { readApiKey } from '../config.js'
import type { DocumentInput } from '../types.js'

export const USAGE = 'Usage: tsx scripts/process-document.ts (--url <url> | --pdf <path> | --image <path>) [--mode ocr|resume] [--out <dir>] [--api-key <key>] [--raw]'

const documentUrlSchema = z.string().url()
const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg'])

export type Mode = 'ocr' | 'resume'

// `--flag value` pairs; a flag with no value reads as 'true'.
export function parseArgs(argv: string[]) {
  const map = new Map<string, string>()
  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i]
    if (!arg.startsWith('--')) continue
    const key = arg.slice(2)
    const next = argv[i + 1]
    const value = next && !next.startsWith('--') ? next : 'true'
    map.set(key, value)
    if (value !== 'true') i += 1
  }
  return map
}

export function readMode(args: Map<string, string>): Mode {
  const mode = String(args.get('mode') || 'resume').trim()
  if (mode !== 'ocr' && mode !== 'resume') {
    throw new Error(`Unknown --mode ${mode}.\n${USAGE}`)
  }
  return mode
}

export function wantsRawResponse(args: Map<string, string>) {
  return args.get('raw') === 'true'
}

/**
 * `--api-key` wins over MISTRAL_API_KEY; the prompt only runs when neither is
 * set. Returns '' when no key was given anywhere.
 */
export async function resolveApiKey(
  args: Map<string, string>,
  env: Record<string, string | undefined>,
  prompt: () => Promise<string>
): Promise<string> {
  const fromArgs = String(args.get('api-key') || '').trim()
  if (fromArgs && fromArgs !== 'true') return fromArgs
  const fromEnv = readApiKey(env)
  if (fromEnv) return fromEnv
  return (await prompt()).trim()
}

export async function readDocumentInput(args: Map<string, string>): Promise<DocumentInput> {
  const url = String(args.get('url') || '').trim()
  const pdfPath = String(args.get('pdf') || '').trim()
  const imagePath = String(args.get('image') || '').trim()

  const provided = [url, pdfPath, imagePath].filter(Boolean)
  if (provided.length !== 1) {
    throw new Error(`Provide exactly one input.\n${USAGE}`)
  }

  if (url) {
    if (!documentUrlSchema.safeParse(url).success) {
      throw new Error(`Not a valid URL: ${url}`)
    }
    return { kind: 'url', url }
  }

  if (pdfPath) {
    if (path.extname(pdfPath).toLowerCase() !== '.pdf') {
      throw new Error(`Expected a .pdf file: ${pdfPath}`)
    }
    return { kind: 'pdf', content: await readFile(pdfPath), fileName: path.basename(pdfPath) }
  }

  if (!IMAGE_EXTENSIONS.has(path.extname(imagePath).toLowerCase())) {
    throw new Error(`Expected a .png, .jpg or .jpeg file: ${imagePath}`)
  }
  return { kind: 'image', content: await readFile(imagePath), fileName: path.basename(imagePath) }
}
