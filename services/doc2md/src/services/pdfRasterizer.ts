import * as mupdf from 'mupdf'
import { describeError, PageRenderError, PdfOpenError } from '../errors.js'

// 2x the 72 DPI user space, roughly 144 DPI.
export const PDF_RENDER_SCALE = 2

export type RasterizedPage = {
  index: number
  png: Buffer
}

export type RasterizeOptions = {
  scale?: number
}

function openPdf(bytes: Uint8Array): mupdf.Document {
  let doc: mupdf.Document
  try {
    doc = mupdf.Document.openDocument(bytes, 'application/pdf')
  } catch (error) {
    throw new PdfOpenError(describeError(error), { cause: error })
  }

  if (doc.needsPassword()) {
    doc.destroy()
    throw new PdfOpenError('document is password protected')
  }
  return doc
}

function readPageCount(doc: mupdf.Document): number {
  let pageCount: number
  try {
    pageCount = doc.countPages()
  } catch (error) {
    throw new PdfOpenError(describeError(error), { cause: error })
  }

  if (pageCount < 1) {
    throw new PdfOpenError('document has no pages')
  }
  return pageCount
}

function renderPage(doc: mupdf.Document, pageNumber: number, scale: number): Buffer {
  let page: mupdf.Page | null = null
  let pixmap: mupdf.Pixmap | null = null

  try {
    page = doc.loadPage(pageNumber - 1)
    pixmap = page.toPixmap(mupdf.Matrix.scale(scale, scale), mupdf.ColorSpace.DeviceRGB, false)
    return Buffer.from(pixmap.asPNG())
  } catch (error) {
    throw new PageRenderError(pageNumber, describeError(error), { cause: error })
  } finally {
    pixmap?.destroy()
    page?.destroy()
  }
}

export function countPdfPages(bytes: Uint8Array): number {
  const doc = openPdf(bytes)
  try {
    return readPageCount(doc)
  } finally {
    doc.destroy()
  }
}

/**
 * Lazily renders each page to PNG, first page first. The document is released when
 * iteration finishes, throws, or is abandoned; call again to start over.
 */
export function* rasterizePdf(bytes: Uint8Array, options: RasterizeOptions = {}): Generator<RasterizedPage, void, undefined> {
  const scale = options.scale ?? PDF_RENDER_SCALE
  const doc = openPdf(bytes)

  try {
    const pageCount = readPageCount(doc)
    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber += 1) {
      yield { index: pageNumber, png: renderPage(doc, pageNumber, scale) }
    }
  } finally {
    doc.destroy()
  }
}
