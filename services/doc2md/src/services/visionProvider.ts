import { ApiError, describeError, NetworkError, ResponseFormatError } from '../errors.js'
import type { ModelRequest } from '../types.js'
import { buildVisionRequest } from './visionRequest.js'

export const VISION_REQUEST_TIMEOUT_MS = 5 * 60 * 1000

export type VisionProviderOptions = {
  timeoutMs?: number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isAbortError(error: unknown) {
  return isRecord(error) && error.name === 'AbortError'
}

function describeFetchFailure(error: unknown) {
  const message = describeError(error)
  if (error instanceof Error && error.cause) {
    return `${message} (${describeError(error.cause)})`
  }
  return message
}

function extractTextFromChatContent(content: unknown): string | null {
  if (typeof content === 'string') return content
  if (!Array.isArray(content)) return null

  const parts = content
    .map((part) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .filter(Boolean)

  return parts.join('\n')
}

export function extractCompletionText(rawBody: string): string {
  let body: unknown
  try {
    body = JSON.parse(rawBody)
  } catch (error) {
    throw new ResponseFormatError('MALFORMED_RESPONSE', 'response body is not JSON', { cause: error })
  }

  const choices = isRecord(body) ? body.choices : undefined
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined
  const message = isRecord(first) ? first.message : undefined
  const content = extractTextFromChatContent(isRecord(message) ? message.content : undefined)

  if (content === null) {
    throw new ResponseFormatError('MALFORMED_RESPONSE', 'missing choices[0].message.content')
  }
  return content
}

/**
 * Sends one page to the chat-completions endpoint and returns the completion text exactly
 * as the model produced it. The bearer header is only sent when an API key was resolved.
 */
export async function requestVisionCompletion(
  request: ModelRequest,
  options: VisionProviderOptions = {}
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? VISION_REQUEST_TIMEOUT_MS
  const headers: Record<string, string> = { 'Content-Type': 'application/json' }
  if (request.apiKey) {
    headers.Authorization = `Bearer ${request.apiKey}`
  }

  const controller = new AbortController()
  const timeout = setTimeout(() => controller.abort(), timeoutMs)

  let status: number
  let ok: boolean
  let rawBody: string
  try {
    const response = await fetch(request.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify(buildVisionRequest({
        model: request.model,
        prompt: request.prompt,
        image: request.image
      })),
      signal: controller.signal
    })
    status = response.status
    ok = response.ok
    rawBody = await response.text()
  } catch (error) {
    if (isAbortError(error)) {
      throw new NetworkError('TIMEOUT', `no response from ${request.endpoint} within ${timeoutMs}ms`, { cause: error })
    }
    throw new NetworkError('CONNECTION_FAILED', `${request.endpoint}: ${describeFetchFailure(error)}`, { cause: error })
  } finally {
    clearTimeout(timeout)
  }

  if (!ok) {
    throw new ApiError(status, rawBody)
  }

  return extractCompletionText(rawBody)
}
