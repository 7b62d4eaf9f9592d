export type InputType = 'url' | 'pdf' | 'image'

export type DocumentInput =
  | { kind: 'url'; url: string }
  | { kind: 'pdf'; content: Buffer; fileName: string }
  | { kind: 'image'; content: Buffer; fileName?: string | null }

export type DocumentSource =
  | { type: 'document_url'; documentUrl: string }
  | { type: 'image_url'; imageUrl: string }

export type OcrPage = Readonly<{
  index: number
  markdown: string
}>

// `raw` is the response body exactly as the OCR endpoint returned it.
export type OcrResponse = {
  pages: OcrPage[]
  raw: unknown
}
