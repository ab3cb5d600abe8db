/**
 * Contracts between the dubbing orchestrator and the provider adapters.
 * Adapters throw their stage error (IngestionError, TranslationError, SynthesisError, CompositionError);
 * the orchestrator never looks past these interfaces.
 */

/** Time-aligned transcript segment, seconds from video start. */
export interface TranscriptSegment {
  start: number
  end: number
  text: string
}

/** Translated segment; count and boundaries may differ from the input, overall span may not. */
export interface TranslatedSegment extends TranscriptSegment {
  originalText: string
}

/** Local copy of the source video produced by ingestion. */
export interface IngestedVideo {
  /** Local path (or provider locator) the composer and voice cloning read from. */
  reference: string
  durationSec: number
}

export interface TranscriptionResult {
  sourceLanguage: string
  text: string
  segments: TranscriptSegment[]
  video: IngestedVideo
  /** Files the orchestrator deletes once the job is finished. */
  tempFiles?: string[]
}

export interface Transcriber {
  transcribe(sourceReference: string): Promise<TranscriptionResult>
}

export interface Translator {
  translate(segments: TranscriptSegment[], targetLanguage: string): Promise<TranslatedSegment[]>
}

export type VoiceSelector =
  | { kind: 'explicit'; voiceId: string }
  | { kind: 'default'; language: string }
  | { kind: 'clone'; language: string; video: IngestedVideo }

export interface AudioArtifact {
  path: string
  /** Voice actually used (after default resolution or cloning fallback). */
  voiceId: string
  /** The voice was cloned for this job only and has already been deleted from the provider. */
  clonedVoice?: boolean
  durationSec?: number
  tempFiles?: string[]
}

export interface Voice {
  voiceId: string
  name: string
  displayName: string
  category?: string
  gender?: string
  age?: string
  language?: string
  description?: string
}

export interface Synthesizer {
  /** False when the provider is not configured or demo mode is forced; stages 3-4 are then skipped. */
  readonly available: boolean
  synthesize(segments: TranslatedSegment[], voice: VoiceSelector): Promise<AudioArtifact>
  listVoices(language?: string): Promise<Voice[]>
}

export interface ComposedVideo {
  /** Locator clients can fetch, e.g. /api/download/<file>. */
  reference: string
}

export interface Composer {
  compose(video: IngestedVideo, audio: AudioArtifact): Promise<ComposedVideo>
}

export interface PipelineAdapters {
  transcriber: Transcriber
  translator: Translator
  synthesizer: Synthesizer
  composer: Composer
}
