export type InputKind = 'image' | 'pdf'

export type InputDocument = {
  readonly path: string
  readonly kind: InputKind
  readonly mimeType: string
  readonly bytes: Buffer
}

export type EncodedImage = {
  readonly mimeType: string
  readonly base64: string
}

export type PageImage = {
  readonly index: number
  readonly image: EncodedImage
}

export type ModelRequest = {
  readonly model: string
  readonly endpoint: string
  readonly prompt: string
  readonly image: EncodedImage
  readonly apiKey?: string | null
}

export type ModelResponse = {
  readonly pageIndex: number
  readonly text: string
}

export type DocumentResult = {
  readonly markdown: string
  readonly pages: readonly ModelResponse[]
}

export type ModelSettings = {
  readonly endpoint: string
  readonly model: string
  readonly apiKey: string | null
  readonly allowEmptyPages: boolean
}

export type ResolvedConfig = ModelSettings & {
  readonly inputPath: string
  readonly outputPath: string | null
}
