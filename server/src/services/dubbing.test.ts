import { describe, it, expect, vi } from 'vitest'
import { CompositionError, IngestionError, InvalidRequestError, NotFoundError, SynthesisError } from '../lib/errors'
import { JobStore } from '../models/Job'
import { JobRunner } from '../workers/jobRunner'
import { CLONED_VOICE_NOTE, DEMO_MODE_NOTE, DubbingOrchestrator, selectVoice } from './dubbing'
import type {
  AudioArtifact,
  PipelineAdapters,
  Synthesizer,
  TranscriptionResult,
  TranslatedSegment,
  TranscriptSegment,
  VoiceSelector,
} from './pipeline'

const SOURCE_URL = 'https://example.com/talk.mp4'

function transcript(sourceLanguage = 'en'): TranscriptionResult {
  return {
    sourceLanguage,
    text: 'Hello world. How are you?',
    segments: [
      { start: 0, end: 1.5, text: 'Hello world.' },
      { start: 1.5, end: 3, text: 'How are you?' },
    ],
    video: { reference: '/nonexistent/dub-source.mp4', durationSec: 3 },
  }
}

function fakeSynthesizer(available = true): Synthesizer {
  return {
    available,
    synthesize: vi.fn(
      async (_segments: TranslatedSegment[], voice: VoiceSelector): Promise<AudioArtifact> => ({
        path: '/nonexistent/dub-speech.mp3',
        voiceId: voice.kind === 'explicit' ? voice.voiceId : `default-${voice.language}`,
      })
    ),
    listVoices: vi.fn(async () => []),
  }
}

function fakeAdapters(overrides: Partial<PipelineAdapters> = {}): PipelineAdapters {
  return {
    transcriber: { transcribe: vi.fn(async () => transcript()) },
    translator: {
      translate: vi.fn(async (segments: TranscriptSegment[], lang: string) =>
        segments.map((s) => ({ ...s, text: `[${lang}] ${s.text}`, originalText: s.text }))
      ),
    },
    synthesizer: fakeSynthesizer(),
    composer: { compose: vi.fn(async () => ({ reference: '/api/download/dub-out.mp4' })) },
    ...overrides,
  }
}

function setup(adapters: PipelineAdapters = fakeAdapters(), concurrency = 0) {
  let n = 0
  const store = new JobStore({ generateId: () => `job-${++n}` })
  const runner = new JobRunner(concurrency)
  const orchestrator = new DubbingOrchestrator({ store, runner, adapters })
  return { store, runner, orchestrator }
}

describe('DubbingOrchestrator.submit', () => {
  it('returns the job id before any stage runs', () => {
    const adapters = fakeAdapters()
    const { store, orchestrator } = setup(adapters)

    const response = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })

    expect(response).toEqual({ jobId: 'job-1', status: 'started' })
    expect(adapters.transcriber.transcribe).not.toHaveBeenCalled()
    const job = store.get(response.jobId)
    expect(job.status).toBe('queued')
    expect(job.progress).toBeLessThan(100)
  })

  it('runs all four stages and reports 10/30/60/85 along the way', async () => {
    const seen: number[] = []
    const { store, runner, orchestrator } = setup(
      fakeAdapters({
        transcriber: {
          transcribe: vi.fn(async () => {
            seen.push(store.get('job-1').progress)
            return transcript()
          }),
        },
        translator: {
          translate: vi.fn(async (segments: TranscriptSegment[]) => {
            seen.push(store.get('job-1').progress)
            return segments.map((s) => ({ ...s, text: `es: ${s.text}`, originalText: s.text }))
          }),
        },
        synthesizer: {
          available: true,
          synthesize: vi.fn(async () => {
            seen.push(store.get('job-1').progress)
            return { path: '/nonexistent/dub-speech.mp3', voiceId: 'voice-1' }
          }),
          listVoices: vi.fn(async () => []),
        },
        composer: {
          compose: vi.fn(async () => {
            seen.push(store.get('job-1').progress)
            return { reference: '/api/download/dub-out.mp4' }
          }),
        },
      })
    )

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()

    expect(seen).toEqual([10, 30, 60, 85])
    const job = store.get(jobId)
    expect(job.status).toBe('completed')
    expect(job.progress).toBe(100)
    expect(job.message).toBe('Dubbing completed successfully.')
    expect(job.error).toBeUndefined()
    expect(job.result).toMatchObject({
      videoUrl: '/api/download/dub-out.mp4',
      targetLanguage: 'es',
      sourceLanguage: 'en',
      voiceId: 'voice-1',
      segmentCount: 2,
      translatedSegmentCount: 2,
      demoMode: false,
    })
    expect(job.result?.processingTimeMs).toBeGreaterThanOrEqual(0)
  })

  it('fails the job at ingestion when the transcriber throws', async () => {
    const adapters = fakeAdapters({
      transcriber: { transcribe: vi.fn(async () => Promise.reject(new IngestionError('Failed to download: HTTP 404'))) },
    })
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()

    const job = store.get(jobId)
    expect(job.status).toBe('failed')
    expect(job.error).toBe('ingestion/transcription failed: Failed to download: HTTP 404')
    expect(job.progress).toBe(10)
    expect(job.result).toBeUndefined()
    expect(adapters.translator.translate).not.toHaveBeenCalled()
  })

  it('fails the job naming composition when the composer throws', async () => {
    const adapters = fakeAdapters({
      composer: { compose: vi.fn(async () => Promise.reject(new CompositionError('ffmpeg exited with code 1'))) },
    })
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()

    const job = store.get(jobId)
    expect(job.status).toBe('failed')
    expect(job.error).toBe('composition failed: ffmpeg exited with code 1')
    expect(job.progress).toBe(85)
    expect(job.result).toBeUndefined()
  })

  it('completes when translation returns fewer segments than the transcript', async () => {
    const adapters = fakeAdapters({
      translator: {
        translate: vi.fn(async (segments: TranscriptSegment[]) => [
          {
            start: segments[0].start,
            end: segments[segments.length - 1].end,
            text: 'Hola mundo. ¿Cómo estás?',
            originalText: segments.map((s) => s.text).join(' '),
          },
        ]),
      },
    })
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()

    const job = store.get(jobId)
    expect(job.status).toBe('completed')
    expect(job.result).toMatchObject({ segmentCount: 2, translatedSegmentCount: 1 })
  })

  it('notes in the result that a cloned voice was temporary', async () => {
    const synthesizer = fakeSynthesizer()
    vi.mocked(synthesizer.synthesize).mockResolvedValue({
      path: '/nonexistent/dub-speech.mp3',
      voiceId: 'clone-1',
      clonedVoice: true,
    })
    const { store, runner, orchestrator } = setup(fakeAdapters({ synthesizer }))

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es', cloneOriginalVoice: true })
    await runner.onIdle()

    expect(store.get(jobId).result).toMatchObject({ voiceId: 'clone-1', note: CLONED_VOICE_NOTE, demoMode: false })
  })

  it('fails the job naming translation when the translator throws', async () => {
    const adapters = fakeAdapters({
      translator: { translate: vi.fn(async () => Promise.reject(new Error('rate limited'))) },
    })
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()

    const job = store.get(jobId)
    expect(job.status).toBe('failed')
    expect(job.error).toBe('translation failed: rate limited')
    expect(job.message).toBe('Dubbing failed: translation failed: rate limited')
    expect(job.result).toBeUndefined()
    expect(job.progress).toBe(30)
    expect(adapters.synthesizer.synthesize).not.toHaveBeenCalled()
  })

  it('surfaces the provider cause when synthesis fails', async () => {
    const synthesizer = fakeSynthesizer()
    vi.mocked(synthesizer.synthesize).mockRejectedValue(new SynthesisError('quota exceeded'))
    const adapters = fakeAdapters({ synthesizer })
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()

    const job = store.get(jobId)
    expect(job.status).toBe('failed')
    expect(job.error).toContain('synthesis')
    expect(job.error).toContain('quota exceeded')
    expect(job.progress).toBe(60)
    expect(adapters.composer.compose).not.toHaveBeenCalled()
  })

  it('completes in demo mode when the synthesizer is unavailable', async () => {
    const adapters = fakeAdapters({ synthesizer: fakeSynthesizer(false) })
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'fr', voiceId: 'v-9' })
    await runner.onIdle()

    const job = store.get(jobId)
    expect(job.status).toBe('completed')
    expect(job.message).toBe('Dubbing completed in demo mode (voice synthesis unavailable).')
    expect(job.result).toMatchObject({
      videoUrl: SOURCE_URL,
      voiceId: 'v-9',
      demoMode: true,
      note: DEMO_MODE_NOTE,
      targetLanguage: 'fr',
    })
    expect(adapters.synthesizer.synthesize).not.toHaveBeenCalled()
    expect(adapters.composer.compose).not.toHaveBeenCalled()
  })

  it('skips translation when the video is already in the target language', async () => {
    const adapters = fakeAdapters({ transcriber: { transcribe: vi.fn(async () => transcript('es')) } })
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()

    expect(adapters.translator.translate).not.toHaveBeenCalled()
    expect(vi.mocked(adapters.synthesizer.synthesize).mock.calls[0][0]).toEqual([
      { start: 0, end: 1.5, text: 'Hello world.', originalText: 'Hello world.' },
      { start: 1.5, end: 3, text: 'How are you?', originalText: 'How are you?' },
    ])
    expect(store.get(jobId).status).toBe('completed')
  })

  it('passes the explicit voice through to synthesis', async () => {
    const adapters = fakeAdapters()
    const { store, runner, orchestrator } = setup(adapters)

    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'de', voiceId: 'voice-42' })
    await runner.onIdle()

    expect(vi.mocked(adapters.synthesizer.synthesize).mock.calls[0][1]).toEqual({ kind: 'explicit', voiceId: 'voice-42' })
    expect(store.get(jobId).result?.voiceId).toBe('voice-42')
  })

  it('leaves later jobs queued while the concurrency limit is reached', async () => {
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    const adapters = fakeAdapters({
      transcriber: {
        transcribe: vi.fn(async () => {
          await gate
          return transcript()
        }),
      },
    })
    const { store, runner, orchestrator } = setup(adapters, 1)

    const first = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    const second = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'it' })
    await new Promise<void>((resolve) => setImmediate(resolve))

    expect(store.get(first.jobId).status).toBe('processing')
    expect(store.get(second.jobId).status).toBe('queued')

    release()
    await runner.onIdle()
    expect(store.get(first.jobId).status).toBe('completed')
    expect(store.get(second.jobId).status).toBe('completed')
  })

  it('posts the final state to the webhook', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 204 }))
    vi.stubGlobal('fetch', fetchMock)
    const { runner, orchestrator } = setup()

    const { jobId } = orchestrator.submit({
      sourceUrl: SOURCE_URL,
      targetLanguage: 'es',
      webhookUrl: 'https://hooks.example.com/dub',
    })
    await runner.onIdle()

    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://hooks.example.com/dub')
    const body: unknown = JSON.parse(String(init?.body))
    expect(body).toMatchObject({ jobId, status: 'completed' })
  })

  it('rejects invalid requests without creating a job', () => {
    const { store, orchestrator } = setup()
    expect(() => orchestrator.submit({ targetLanguage: 'es' })).toThrow(InvalidRequestError)
    expect(() => orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'xx' })).toThrow(
      'Unsupported target language: xx'
    )
    expect(store.size).toBe(0)
  })

  it('reports NotFound once the store is cleared', async () => {
    const { store, runner, orchestrator } = setup()
    const { jobId } = orchestrator.submit({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })
    await runner.onIdle()
    store.clear()
    expect(() => store.get(jobId)).toThrow(NotFoundError)
  })
})

describe('DubbingOrchestrator.preview', () => {
  it('returns both transcripts without touching the job store', async () => {
    const adapters = fakeAdapters()
    const { store, orchestrator } = setup(adapters)

    const preview = await orchestrator.preview({ sourceUrl: SOURCE_URL, targetLanguage: 'es' })

    expect(preview.sourceLanguage).toBe('en')
    expect(preview.targetLanguage).toBe('es')
    expect(preview.originalTranscript.text).toBe('Hello world. How are you?')
    expect(preview.translatedTranscript.map((s) => s.text)).toEqual(['[es] Hello world.', '[es] How are you?'])
    expect(store.size).toBe(0)
    expect(adapters.synthesizer.synthesize).not.toHaveBeenCalled()
  })

  it('wraps an unexpected transcriber error as an ingestion failure', async () => {
    const adapters = fakeAdapters({
      transcriber: { transcribe: vi.fn(async () => Promise.reject(new Error('download refused'))) },
    })
    const { orchestrator } = setup(adapters)

    const err = await orchestrator.preview({ sourceUrl: SOURCE_URL, targetLanguage: 'es' }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(IngestionError)
    expect(err).toMatchObject({ stage: 'transcription', message: 'download refused', statusCode: 502 })
  })
})

describe('selectVoice', () => {
  const video = { reference: '/nonexistent/dub-source.mp4', durationSec: 3 }

  it('prefers cloning over an explicit voice', () => {
    expect(
      selectVoice({ sourceUrl: SOURCE_URL, targetLanguage: 'es', voiceId: 'v1', cloneOriginalVoice: true }, video)
    ).toEqual({ kind: 'clone', language: 'es', video })
  })

  it('falls back to the language default', () => {
    expect(selectVoice({ sourceUrl: SOURCE_URL, targetLanguage: 'ja', cloneOriginalVoice: false }, video)).toEqual({
      kind: 'default',
      language: 'ja',
    })
  })
})
