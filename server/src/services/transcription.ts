import fs from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { errorMessage, IngestionError } from '../lib/errors'
import { getLogger } from '../lib/logger'
import { getOpenAIClient } from '../lib/openai'
import { removeFiles } from '../utils/fileCleanup'
import { toLanguageCode } from '../utils/languages'
import { tempDir } from '../utils/queueConfig'
import { extractAudio, getMediaDuration, splitAudioIntoChunks } from './ffmpeg'
import type { Transcriber, TranscriptionResult, TranscriptSegment } from './pipeline'
import { downloadVideoFromURL } from './video'

/** Use parallel chunked transcription for videos this long or longer (seconds). */
const PARALLEL_THRESHOLD_SEC = 150
/** Duration of each chunk for parallel transcription (seconds). Whisper limit 25MB; ~3 min mono 16kHz is safe. */
const CHUNK_DURATION_SEC = 180

/** Language code reported when Whisper does not detect one. */
export const UNKNOWN_LANGUAGE = 'und'

/** Whisper's detected language name as an ISO code, or `und`. */
export function toSourceLanguage(whisperLanguage: string | undefined): string {
  return toLanguageCode(whisperLanguage) ?? UNKNOWN_LANGUAGE
}

export interface VerboseTranscription {
  text: string
  language?: string
  segments: TranscriptSegment[]
}

function readNumber(value: unknown): number {
  const n = Number(value)
  return Number.isFinite(n) ? n : 0
}

/**
 * Normalize a Whisper `verbose_json` response: trims segment text, drops empty segments
 * and shifts timestamps by `offsetSec` (chunked transcription).
 */
export function parseVerboseTranscription(raw: unknown, offsetSec = 0): VerboseTranscription {
  if (typeof raw !== 'object' || raw === null) {
    return { text: '', segments: [] }
  }
  const rawSegments: unknown = Reflect.get(raw, 'segments')
  const segments: TranscriptSegment[] = []
  if (Array.isArray(rawSegments)) {
    for (const s of rawSegments) {
      if (typeof s !== 'object' || s === null) continue
      const text: unknown = Reflect.get(s, 'text')
      if (typeof text !== 'string' || !text.trim()) continue
      segments.push({
        start: readNumber(Reflect.get(s, 'start')) + offsetSec,
        end: readNumber(Reflect.get(s, 'end')) + offsetSec,
        text: text.trim(),
      })
    }
  }
  const rawText: unknown = Reflect.get(raw, 'text')
  const language: unknown = Reflect.get(raw, 'language')
  return {
    text: typeof rawText === 'string' ? rawText.trim() : segments.map((s) => s.text).join(' '),
    language: typeof language === 'string' ? language : undefined,
    segments,
  }
}

async function transcribeAudioFile(audioPath: string, offsetSec: number): Promise<VerboseTranscription> {
  const raw: unknown = await getOpenAIClient().audio.transcriptions.create({
    file: fs.createReadStream(audioPath),
    model: 'whisper-1',
    response_format: 'verbose_json',
    timestamp_granularities: ['segment'],
  })
  return parseVerboseTranscription(raw, offsetSec)
}

/** Split long audio, transcribe chunks in parallel and merge segments back into timeline order. */
async function transcribeInChunks(audioPath: string, prefix: string): Promise<VerboseTranscription> {
  let chunkPaths: string[] = []
  try {
    chunkPaths = await splitAudioIntoChunks(audioPath, CHUNK_DURATION_SEC, path.dirname(audioPath), prefix)
    const results = await Promise.all(
      chunkPaths.map((chunkPath, i) => transcribeAudioFile(chunkPath, i * CHUNK_DURATION_SEC))
    )
    const segments = results.flatMap((r) => r.segments).sort((a, b) => a.start - b.start)
    return {
      text: segments.map((s) => s.text).join(' '),
      language: results.find((r) => r.language)?.language,
      segments,
    }
  } finally {
    await removeFiles(chunkPaths)
  }
}

/**
 * Transcriber backed by OpenAI Whisper. Downloads the source into the temp dir; the downloaded
 * video stays on disk (returned in `tempFiles`) because composition needs it later.
 */
export class WhisperTranscriber implements Transcriber {
  constructor(private readonly workDir: string = tempDir) {}

  async transcribe(sourceReference: string): Promise<TranscriptionResult> {
    const log = getLogger('worker')
    const id = uuidv4()
    const videoPath = path.join(this.workDir, `dub-${id}-source.mp4`)
    const audioPath = path.join(this.workDir, `dub-${id}-audio.mp3`)
    try {
      await downloadVideoFromURL(sourceReference, videoPath)
      const durationSec = await getMediaDuration(videoPath)
      await extractAudio(videoPath, audioPath)
      log.info({ msg: 'Transcribing audio', durationSec, chunked: durationSec >= PARALLEL_THRESHOLD_SEC })
      const transcription =
        durationSec >= PARALLEL_THRESHOLD_SEC
          ? await transcribeInChunks(audioPath, `dub-${id}-chunk`)
          : await transcribeAudioFile(audioPath, 0)
      if (transcription.segments.length === 0) {
        throw new Error('No speech detected in the video')
      }
      return {
        sourceLanguage: toSourceLanguage(transcription.language),
        text: transcription.text,
        segments: transcription.segments,
        video: { reference: videoPath, durationSec },
        tempFiles: [videoPath],
      }
    } catch (err) {
      await removeFiles([videoPath])
      throw new IngestionError(errorMessage(err), { cause: err })
    } finally {
      await removeFiles([audioPath])
    }
  }
}
