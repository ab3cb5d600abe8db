import { InvalidRequestError } from '../lib/errors'
import type { DubbingRequest } from '../models/Job'
import { isWebhookUrl } from '../utils/webhook'

export interface PreviewRequest {
  sourceUrl: string
  targetLanguage: string
}

function field(body: object, key: string): unknown {
  return key in body ? Reflect.get(body, key) : undefined
}

function requireBody(body: unknown): object {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidRequestError('Request body must be a JSON object')
  }
  return body
}

function parseSourceAndLanguage(body: object, supportedLanguages: readonly string[]): PreviewRequest {
  const sourceUrl = field(body, 'sourceUrl')
  if (typeof sourceUrl !== 'string' || !sourceUrl.trim()) {
    throw new InvalidRequestError('Missing or invalid sourceUrl')
  }
  const targetLanguage = field(body, 'targetLanguage')
  if (typeof targetLanguage !== 'string' || !targetLanguage.trim()) {
    throw new InvalidRequestError('Missing or invalid targetLanguage')
  }
  const lang = targetLanguage.trim().toLowerCase()
  if (!supportedLanguages.includes(lang)) {
    throw new InvalidRequestError(
      `Unsupported target language: ${lang}. Supported languages: ${supportedLanguages.join(', ')}`
    )
  }
  return { sourceUrl: sourceUrl.trim(), targetLanguage: lang }
}

/** Validate a POST /api/dub body. Throws InvalidRequestError; nothing is created on failure. */
export function parseDubbingRequest(input: unknown, supportedLanguages: readonly string[]): DubbingRequest {
  const body = requireBody(input)
  const { sourceUrl, targetLanguage } = parseSourceAndLanguage(body, supportedLanguages)

  const voiceId = field(body, 'voiceId')
  if (voiceId != null && typeof voiceId !== 'string') {
    throw new InvalidRequestError('voiceId must be a string')
  }
  const clone = field(body, 'cloneOriginalVoice')
  if (clone != null && typeof clone !== 'boolean') {
    throw new InvalidRequestError('cloneOriginalVoice must be a boolean')
  }
  const webhookUrl = field(body, 'webhookUrl')
  if (webhookUrl != null && (typeof webhookUrl !== 'string' || !isWebhookUrl(webhookUrl))) {
    throw new InvalidRequestError('webhookUrl must be an http(s) URL')
  }

  const request: DubbingRequest = {
    sourceUrl,
    targetLanguage,
    cloneOriginalVoice: clone === true,
  }
  if (typeof voiceId === 'string' && voiceId.trim()) request.voiceId = voiceId.trim()
  if (typeof webhookUrl === 'string') request.webhookUrl = webhookUrl.trim()
  return request
}

export function parsePreviewRequest(input: unknown, supportedLanguages: readonly string[]): PreviewRequest {
  return parseSourceAndLanguage(requireBody(input), supportedLanguages)
}
