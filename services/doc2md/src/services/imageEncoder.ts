import { EncodingError } from '../errors.js'
import type { EncodedImage } from '../types.js'

export function encodeImage(bytes: Uint8Array, mimeType: string): EncodedImage {
  const normalizedMime = String(mimeType || '').trim().toLowerCase()
  if (!normalizedMime.startsWith('image/')) {
    throw new EncodingError(`not an image mime type: ${mimeType || '(empty)'}`)
  }
  if (bytes.byteLength === 0) {
    throw new EncodingError('image is empty')
  }

  const base64 = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64')
  return Object.freeze({ mimeType: normalizedMime, base64 })
}

export function toDataUrl(image: EncodedImage): string {
  return `data:${image.mimeType};base64,${image.base64}`
}
