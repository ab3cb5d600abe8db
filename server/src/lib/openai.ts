import OpenAI from 'openai'
import { PROVIDER_TIMEOUT_MS } from '../utils/queueConfig'

export const OPENAI_MODEL = process.env.OPENAI_MODEL || 'gpt-4o-mini'

let client: OpenAI | undefined

/**
 * Shared OpenAI client, created on first use so the API can boot (and report readiness) without a key.
 */
export function getOpenAIClient(): OpenAI {
  if (client) return client
  const apiKey = process.env.OPENAI_API_KEY
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is not set')
  }
  client = new OpenAI({ apiKey, timeout: PROVIDER_TIMEOUT_MS, maxRetries: 2 })
  return client
}
