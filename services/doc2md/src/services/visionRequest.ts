import { toDataUrl } from './imageEncoder.js'
import type { EncodedImage } from '../types.js'

export const DEFAULT_EXTRACTION_PROMPT = [
  'Please extract all text from this image and convert it to Markdown format,',
  'attempting to preserve the original document formatting.',
  'The output should be a Markdown representation of the original image/document text.',
  'If there are tables in the image, recreate them as Markdown tables in the output.',
  'Formatted Markdown output only, no HTML.'
].join(' ')

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } }

export type ChatCompletionRequest = {
  model: string
  messages: Array<{ role: 'user'; content: ChatContentPart[] }>
}

export function buildVisionRequest(params: {
  model: string
  prompt?: string
  image: EncodedImage
}): ChatCompletionRequest {
  return {
    model: params.model,
    messages: [
      {
        role: 'user',
        content: [
          { type: 'text', text: params.prompt ?? DEFAULT_EXTRACTION_PROMPT },
          { type: 'image_url', image_url: { url: toDataUrl(params.image) } }
        ]
      }
    ]
  }
}
