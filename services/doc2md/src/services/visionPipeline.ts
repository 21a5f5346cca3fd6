import { PageFailedError, ResponseFormatError } from '../errors.js'
import type { DocumentResult, InputDocument, ModelRequest, ModelResponse, ModelSettings, PageImage } from '../types.js'
import { loadInputDocument } from './formatDetector.js'
import { encodeImage } from './imageEncoder.js'
import { countPdfPages, rasterizePdf, type RasterizedPage } from './pdfRasterizer.js'
import { DEFAULT_EXTRACTION_PROMPT } from './visionRequest.js'
import { requestVisionCompletion } from './visionProvider.js'

export const PAGE_SEPARATOR = '\n\n'

export type VisionPipelineConfig = ModelSettings & {
  prompt?: string
}

export type VisionPipelineDeps = {
  rasterize?: (bytes: Uint8Array) => Iterable<RasterizedPage>
  countPages?: (bytes: Uint8Array) => number
  complete?: (request: ModelRequest) => Promise<string>
  log?: (line: string) => void
}

type PageSource = {
  index: number
  bytes: Uint8Array
  mimeType: string
}

function* imagePages(document: InputDocument): Generator<PageSource> {
  yield { index: 1, bytes: document.bytes, mimeType: document.mimeType }
}

function* pdfPages(pages: Iterable<RasterizedPage>): Generator<PageSource> {
  for (const page of pages) {
    yield { index: page.index, bytes: page.png, mimeType: 'image/png' }
  }
}

async function transcribePage(
  page: PageImage,
  config: VisionPipelineConfig,
  complete: (request: ModelRequest) => Promise<string>
): Promise<ModelResponse> {
  const text = await complete({
    model: config.model,
    endpoint: config.endpoint,
    prompt: config.prompt ?? DEFAULT_EXTRACTION_PROMPT,
    image: page.image,
    apiKey: config.apiKey
  })

  if (!config.allowEmptyPages && text.trim() === '') {
    throw new ResponseFormatError('EMPTY_COMPLETION', 'model returned no text for this page')
  }
  return { pageIndex: page.index, text }
}

export function joinPages(pages: readonly ModelResponse[]): string {
  return [...pages]
    .sort((a, b) => a.pageIndex - b.pageIndex)
    .map((page) => page.text)
    .join(PAGE_SEPARATOR)
}

/**
 * Converts one image or PDF into Markdown, one model request per page, strictly in page
 * order. The first failing page aborts the whole run; nothing partial is returned.
 */
export async function convertDocument(
  inputPath: string,
  config: VisionPipelineConfig,
  deps: VisionPipelineDeps = {}
): Promise<DocumentResult> {
  const rasterize = deps.rasterize ?? rasterizePdf
  const countPages = deps.countPages ?? countPdfPages
  const complete = deps.complete ?? ((request: ModelRequest) => requestVisionCompletion(request))
  const log = deps.log ?? ((line: string) => console.error(line))

  const document = await loadInputDocument(inputPath)
  const pageCount = document.kind === 'pdf' ? countPages(document.bytes) : 1
  const sources = document.kind === 'pdf' ? pdfPages(rasterize(document.bytes)) : imagePages(document)

  const responses: ModelResponse[] = []
  for (const source of sources) {
    try {
      const page: PageImage = { index: source.index, image: encodeImage(source.bytes, source.mimeType) }
      responses.push(await transcribePage(page, config, complete))
    } catch (error) {
      throw new PageFailedError(source.index, error)
    }
    log(`[doc2md] processed page ${source.index}/${pageCount}`)
  }

  return Object.freeze({
    markdown: joinPages(responses),
    pages: Object.freeze(responses)
  })
}
