import { constants } from 'node:fs'
import { access, readFile, stat } from 'node:fs/promises'
import path from 'node:path'
import { InputError } from '../errors.js'
import type { InputDocument, InputKind } from '../types.js'

const IMAGE_MIME_BY_EXT: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  bmp: 'image/bmp',
  webp: 'image/webp'
}

export const SUPPORTED_EXTENSIONS = [...Object.keys(IMAGE_MIME_BY_EXT), 'pdf']

export type DetectedFormat = {
  kind: InputKind
  mimeType: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function normalizeExtension(filePath: string) {
  return path.extname(filePath).toLowerCase().replace(/^\./, '')
}

export function classifyExtension(filePath: string): DetectedFormat {
  const ext = normalizeExtension(filePath)
  if (ext === 'pdf') return { kind: 'pdf', mimeType: 'application/pdf' }

  const mimeType = IMAGE_MIME_BY_EXT[ext]
  if (mimeType) return { kind: 'image', mimeType }

  throw new InputError(
    'UNSUPPORTED_FORMAT',
    `${filePath} (supported: ${SUPPORTED_EXTENSIONS.join(', ')})`
  )
}

export async function detectInputFormat(filePath: string): Promise<DetectedFormat> {
  const info = await stat(filePath).catch((error: unknown) => {
    const code = isRecord(error) ? error.code : undefined
    if (code === 'ENOENT' || code === 'ENOTDIR') return null
    throw new InputError('INPUT_UNREADABLE', filePath, { cause: error })
  })
  if (!info || !info.isFile()) {
    throw new InputError('INPUT_NOT_FOUND', `the file ${filePath} does not exist`)
  }

  try {
    await access(filePath, constants.R_OK)
  } catch (error) {
    throw new InputError('INPUT_UNREADABLE', filePath, { cause: error })
  }

  return classifyExtension(filePath)
}

export async function loadInputDocument(filePath: string): Promise<InputDocument> {
  const format = await detectInputFormat(filePath)

  let bytes: Buffer
  try {
    bytes = await readFile(filePath)
  } catch (error) {
    throw new InputError('INPUT_UNREADABLE', filePath, { cause: error })
  }

  return Object.freeze({ path: filePath, kind: format.kind, mimeType: format.mimeType, bytes })
}
