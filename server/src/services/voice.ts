import fs from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import type pino from 'pino'
import { errorMessage, SynthesisError } from '../lib/errors'
import { getLogger } from '../lib/logger'
import { VOICE_DEMO_MODE } from '../utils/featureFlags'
import { removeFiles } from '../utils/fileCleanup'
import { PROVIDER_TIMEOUT_MS, tempDir } from '../utils/queueConfig'
import { extractAudio } from './ffmpeg'
import type { AudioArtifact, IngestedVideo, Synthesizer, TranslatedSegment, Voice, VoiceSelector } from './pipeline'

const ELEVENLABS_BASE_URL = 'https://api.elevenlabs.io/v1'
/** Seconds of source audio uploaded for instant voice cloning. */
export const CLONE_SAMPLE_SECONDS = 60
/** Characters per text-to-speech request. */
export const MAX_TTS_CHARS = 2500

/** Premade multilingual voices used when the caller names none. */
const DEFAULT_VOICES: Record<string, string> = {
  en: 'IKne3meq5aSn9XLyUdCD',
  es: 'JBFqnCBsd6RMkjVDRZzb',
  fr: 'N2lVS1w4EtoT3dr4eOWO',
  de: 'TX3LPaxmHKxFdv7VOQHJ',
  it: 'bIHbv24MWmeRgasZH58o',
  pt: 'cjVigY5qzO86Huf0OWal',
  ru: 'iP95p4xoKVk53GoZ742B',
  ja: 'nPczCjzI2devNBz1zQrb',
  ko: 'onwK4e9ZLuTAKqWW03F9',
  zh: 'pqHfZKP75CvOlQylNhV4',
  hi: 'IKne3meq5aSn9XLyUdCD',
  ar: 'onwK4e9ZLuTAKqWW03F9',
}
const FALLBACK_VOICE = 'EXAVITQu4vr4xnSDxMaL'

export const DEMO_VOICES: readonly Voice[] = [
  {
    voiceId: 'demo_multilingual_1',
    name: 'Demo Multilingual Voice',
    displayName: 'Demo Multilingual Voice',
    category: 'demo',
    description: 'Demo voice returned while the voice provider is unavailable',
  },
  {
    voiceId: 'demo_english_1',
    name: 'Demo English Voice',
    displayName: 'Demo English Voice',
    category: 'demo',
    language: 'en',
    description: 'Demo voice for English content',
  },
]

export function defaultVoiceFor(language: string): string {
  return DEFAULT_VOICES[language] || FALLBACK_VOICE
}

function readString(obj: unknown, key: string): string | undefined {
  if (typeof obj !== 'object' || obj === null) return undefined
  const value: unknown = Reflect.get(obj, key)
  return typeof value === 'string' ? value : undefined
}

function readObject(obj: unknown, key: string): object | undefined {
  if (typeof obj !== 'object' || obj === null) return undefined
  const value: unknown = Reflect.get(obj, key)
  return typeof value === 'object' && value !== null ? value : undefined
}

function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    return undefined
  }
}

/** Map one entry of the provider's `GET /voices` reply; entries without an id are skipped. */
export function toVoice(raw: unknown): Voice | undefined {
  const voiceId = readString(raw, 'voice_id')
  if (!voiceId) return undefined
  const labels = readObject(raw, 'labels')
  const name = readString(raw, 'name') || 'Unknown'
  const gender = readString(labels, 'gender') || 'unknown'
  const age = readString(labels, 'age') || 'unknown'
  return {
    voiceId,
    name,
    displayName: `${name} (${gender}, ${age})`,
    category: readString(raw, 'category'),
    gender,
    age,
    language: readString(labels, 'language'),
    description: readString(raw, 'description'),
  }
}

/** Voices without a language label speak every language of the multilingual model. */
export function filterVoicesByLanguage(voices: readonly Voice[], language?: string): Voice[] {
  if (!language) return [...voices]
  const wanted = language.toLowerCase()
  return voices.filter((v) => !v.language || v.language.toLowerCase() === wanted)
}

/** Turn a provider error reply into a short cause, e.g. "quota exceeded: ...". */
export function describeProviderError(status: number, body: string): string {
  const parsed = parseJsonBody(body)
  const nested = readObject(parsed, 'detail')
  const detail = (
    readString(parsed, 'detail') || readString(nested, 'message') || readString(nested, 'status') || body.trim()
  ).slice(0, 300)
  if (status === 401) return `invalid or missing API key${detail ? `: ${detail}` : ''}`
  if (status === 429 || /quota/i.test(detail)) return `quota exceeded${detail ? `: ${detail}` : ''}`
  if (status === 404) return `voice not found${detail ? `: ${detail}` : ''}`
  return `HTTP ${status}${detail ? `: ${detail}` : ''}`
}

/** Split text on sentence ends into pieces of at most `maxChars`; an overlong sentence is cut hard. */
export function splitTextForSpeech(text: string, maxChars: number = MAX_TTS_CHARS): string[] {
  const sentences = text.match(/[^.!?。！？]+[.!?。！？]*\s*|[.!?。！？]+\s*/g) ?? []
  const chunks: string[] = []
  let current = ''
  for (const sentence of sentences) {
    if (current && current.length + sentence.length > maxChars) {
      chunks.push(current.trim())
      current = ''
    }
    let rest = sentence
    while (rest.length > maxChars) {
      chunks.push(rest.slice(0, maxChars).trim())
      rest = rest.slice(maxChars)
    }
    current += rest
  }
  if (current.trim()) chunks.push(current.trim())
  return chunks.filter(Boolean)
}

export interface ElevenLabsOptions {
  apiKey?: string
  modelId?: string
  demoMode?: boolean
  workDir?: string
  fetchImpl?: typeof fetch
  timeoutMs?: number
}

/**
 * Synthesizer backed by the ElevenLabs HTTP API. Unavailable (demo mode) without an API key
 * or when VOICE_DEMO_MODE is set.
 */
export class ElevenLabsSynthesizer implements Synthesizer {
  readonly available: boolean
  private readonly apiKey: string
  private readonly modelId: string
  private readonly workDir: string
  private readonly fetchImpl: typeof fetch
  private readonly timeoutMs: number

  constructor(options: ElevenLabsOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ELEVENLABS_API_KEY ?? ''
    this.modelId = options.modelId ?? (process.env.ELEVENLABS_MODEL_ID || 'eleven_multilingual_v2')
    this.workDir = options.workDir ?? tempDir
    this.fetchImpl = options.fetchImpl ?? fetch
    this.timeoutMs = options.timeoutMs ?? PROVIDER_TIMEOUT_MS
    this.available = Boolean(this.apiKey) && !(options.demoMode ?? VOICE_DEMO_MODE)
  }

  async listVoices(language?: string): Promise<Voice[]> {
    if (!this.apiKey) return filterVoicesByLanguage(DEMO_VOICES, language)
    try {
      const res = await this.request('/voices', { method: 'GET' })
      const body: unknown = await res.json()
      const rawVoices: unknown = typeof body === 'object' && body !== null ? Reflect.get(body, 'voices') : undefined
      const voices = Array.isArray(rawVoices)
        ? rawVoices.map(toVoice).filter((v): v is Voice => v !== undefined)
        : []
      return filterVoicesByLanguage(voices, language)
    } catch (err) {
      getLogger('api').warn({ msg: 'Voice listing failed, returning demo voices', err })
      return filterVoicesByLanguage(DEMO_VOICES, language)
    }
  }

  async synthesize(segments: TranslatedSegment[], voice: VoiceSelector): Promise<AudioArtifact> {
    const log = getLogger('worker')
    const text = segments
      .map((s) => s.text.trim())
      .filter(Boolean)
      .join(' ')
    const chunks = splitTextForSpeech(text)
    if (chunks.length === 0) {
      throw new SynthesisError('No translated text to synthesize')
    }

    let clonedVoiceId: string | undefined
    const outputPath = path.join(this.workDir, `dub-${uuidv4()}-speech.mp3`)
    try {
      const { voiceId, cloned } = await this.resolveVoice(voice, log)
      if (cloned) clonedVoiceId = voiceId
      log.info({ msg: 'Generating speech', voiceId, characters: text.length })

      const parts: Buffer[] = []
      for (const chunk of chunks) {
        const res = await this.request(`/text-to-speech/${encodeURIComponent(voiceId)}`, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Accept: 'audio/mpeg' },
          body: JSON.stringify({
            text: chunk,
            model_id: this.modelId,
            voice_settings: { stability: 0.5, similarity_boost: 0.75 },
          }),
        })
        parts.push(Buffer.from(await res.arrayBuffer()))
      }
      await fs.promises.writeFile(outputPath, Buffer.concat(parts))
      return cloned ? { path: outputPath, voiceId, clonedVoice: true } : { path: outputPath, voiceId }
    } catch (err) {
      await removeFiles([outputPath], log)
      if (err instanceof SynthesisError) throw err
      throw new SynthesisError(errorMessage(err), { cause: err })
    } finally {
      if (clonedVoiceId) await this.deleteVoice(clonedVoiceId, log)
    }
  }

  private async resolveVoice(selector: VoiceSelector, log: pino.Logger): Promise<{ voiceId: string; cloned: boolean }> {
    switch (selector.kind) {
      case 'explicit':
        return { voiceId: selector.voiceId, cloned: false }
      case 'default':
        return { voiceId: defaultVoiceFor(selector.language), cloned: false }
      case 'clone':
        try {
          return { voiceId: await this.cloneVoice(selector.video), cloned: true }
        } catch (err) {
          log.warn({ msg: 'Voice cloning failed, using default voice', language: selector.language, err })
          return { voiceId: defaultVoiceFor(selector.language), cloned: false }
        }
    }
  }

  /** Instant voice clone from the first minute of the source audio. */
  private async cloneVoice(video: IngestedVideo): Promise<string> {
    const samplePath = path.join(this.workDir, `dub-${uuidv4()}-sample.mp3`)
    try {
      await extractAudio(video.reference, samplePath, CLONE_SAMPLE_SECONDS)
      const sample = await fs.promises.readFile(samplePath)
      const form = new FormData()
      form.append('name', `dub-clone-${Date.now()}`)
      form.append('description', 'Cloned from dubbing source audio')
      form.append('files', new Blob([new Uint8Array(sample)], { type: 'audio/mpeg' }), path.basename(samplePath))
      const res = await this.request('/voices/add', { method: 'POST', body: form })
      const voiceId = readString(await res.json(), 'voice_id')
      if (!voiceId) throw new Error('Voice clone response had no voice_id')
      return voiceId
    } finally {
      await removeFiles([samplePath])
    }
  }

  private async deleteVoice(voiceId: string, log: pino.Logger): Promise<void> {
    try {
      await this.request(`/voices/${encodeURIComponent(voiceId)}`, { method: 'DELETE' })
    } catch (err) {
      log.warn({ msg: 'Failed to delete cloned voice', voiceId, err })
    }
  }

  private async request(pathname: string, init: RequestInit): Promise<Response> {
    const headers = new Headers(init.headers)
    headers.set('xi-api-key', this.apiKey)
    const res = await this.fetchImpl(`${ELEVENLABS_BASE_URL}${pathname}`, {
      ...init,
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    })
    if (!res.ok) {
      throw new SynthesisError(describeProviderError(res.status, await res.text()))
    }
    return res
  }
}
