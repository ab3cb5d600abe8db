import ffmpeg from 'fluent-ffmpeg'
import type { FfmpegCommand, FfprobeData } from 'fluent-ffmpeg'
import * as ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import * as ffprobeInstaller from '@ffprobe-installer/ffprobe'
import path from 'path'
import fs from 'fs'
import { v4 as uuidv4 } from 'uuid'
import { CompositionError, errorMessage } from '../lib/errors'
import { getLogger, redactFilePath } from '../lib/logger'
import { tempDir } from '../utils/queueConfig'
import type { AudioArtifact, ComposedVideo, Composer, IngestedVideo } from './pipeline'

// Explicit paths: use env in Docker (e.g. /usr/bin/ffmpeg) if the file exists, else npm installer
function resolveFfmpegPath(envPath: string | undefined, fallback: string): string {
  if (envPath && fs.existsSync(envPath)) return envPath
  return fallback
}
ffmpeg.setFfmpegPath(resolveFfmpegPath(process.env.FFMPEG_PATH, ffmpegInstaller.path))
ffmpeg.setFfprobePath(resolveFfmpegPath(process.env.FFPROBE_PATH, ffprobeInstaller.path))

const FFMPEG_THREADS = process.env.FFMPEG_THREADS || '4'

/** Kill ffmpeg if it produces no progress for 90s; surfaces as the calling stage's error. */
export const HUNG_JOB_MS = 90 * 1000
export const HUNG_JOB_MESSAGE = 'ffmpeg stalled (no progress for 90s)'

function setupHungProtection(
  cmd: FfmpegCommand,
  reject: (err: Error) => void
): { clear: () => void; reset: () => void } {
  let hungTimer: NodeJS.Timeout
  const reset = () => {
    clearTimeout(hungTimer)
    hungTimer = setTimeout(() => {
      cmd.kill('SIGKILL')
      reject(new Error(HUNG_JOB_MESSAGE))
    }, HUNG_JOB_MS)
  }
  const clear = () => clearTimeout(hungTimer)
  reset()
  return { clear, reset }
}

/** Run a prepared command to `outputPath` with hung-process protection. */
function runToFile(cmd: FfmpegCommand, outputPath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hung = setupHungProtection(cmd, reject)
    cmd
      .on('progress', () => hung.reset())
      .on('end', () => {
        hung.clear()
        resolve(outputPath)
      })
      .on('error', (err: Error) => {
        hung.clear()
        reject(err)
      })
      .save(outputPath)
  })
}

/**
 * Extract mono 16 kHz mp3 (Whisper-friendly). `maxSeconds` trims to a leading sample (voice cloning).
 */
export function extractAudio(videoPath: string, outputPath: string, maxSeconds?: number): Promise<string> {
  const options = ['-threads', FFMPEG_THREADS, '-vn', '-acodec', 'libmp3lame', '-ar', '16000', '-ac', '1', '-q:a', '5']
  if (maxSeconds && maxSeconds > 0) options.push('-t', String(maxSeconds))
  return runToFile(ffmpeg(videoPath).outputOptions(options), outputPath)
}

/**
 * Split an audio file into fixed-duration chunks named `<prefix>_NNN.mp3` in `outputDir`.
 * Returns chunk paths in order. Caller must delete them when done.
 */
export function splitAudioIntoChunks(
  audioPath: string,
  chunkDurationSec: number,
  outputDir: string,
  prefix: string
): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const pattern = path.join(outputDir, `${prefix}_%03d.mp3`)
    ffmpeg(audioPath)
      .outputOptions([
        '-f', 'segment',
        '-segment_time', String(chunkDurationSec),
        '-reset_timestamps', '1',
        '-c', 'copy',
        '-map', '0',
      ])
      .output(pattern)
      .on('end', () => {
        const files = fs.readdirSync(outputDir)
          .filter((f) => f.startsWith(`${prefix}_`) && f.endsWith('.mp3'))
          .sort()
        resolve(files.map((f) => path.join(outputDir, f)))
      })
      .on('error', (err: Error) => reject(err))
      .run()
  })
}

/**
 * Duration in seconds of any media file.
 */
export function getMediaDuration(mediaPath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    if (!fs.existsSync(mediaPath)) {
      reject(new Error(`Media file not found: ${redactFilePath(mediaPath)}`))
      return
    }
    ffmpeg.ffprobe(mediaPath, (err: Error | null, metadata: FfprobeData) => {
      if (err) {
        reject(new Error(`Failed to probe media: ${err.message}`))
        return
      }
      const duration = metadata?.format?.duration || 0
      if (duration <= 0) {
        reject(new Error('Could not determine media duration from metadata'))
        return
      }
      resolve(duration)
    })
  })
}

/**
 * atempo filters that stretch audio of `audioSec` to last `videoSec`.
 * A single atempo only takes factors in [0.5, 2.0], so larger changes are chained.
 * Empty when the lengths already agree within 1%.
 */
export function buildAtempoFilters(audioSec: number, videoSec: number): string[] {
  if (!(audioSec > 0) || !(videoSec > 0)) return []
  let factor = audioSec / videoSec
  if (Math.abs(factor - 1) < 0.01) return []
  const filters: string[] = []
  while (factor > 2) {
    filters.push('atempo=2.0000')
    factor /= 2
  }
  while (factor < 0.5) {
    filters.push('atempo=0.5000')
    factor /= 0.5
  }
  filters.push(`atempo=${factor.toFixed(4)}`)
  return filters
}

/**
 * Replace the audio track of `videoPath` with `audioPath`, stretched to the video's full length.
 * Segment-level alignment is not attempted; the translated track may have a different segment count.
 */
export function replaceAudioTrack(
  videoPath: string,
  audioPath: string,
  outputPath: string,
  durations: { videoSec: number; audioSec: number }
): Promise<string> {
  const filters = [...buildAtempoFilters(durations.audioSec, durations.videoSec), 'apad']
  const cmd = ffmpeg()
    .input(videoPath)
    .input(audioPath)
    .audioFilters(filters)
    .outputOptions([
      '-threads', FFMPEG_THREADS,
      '-map', '0:v:0',
      '-map', '1:a:0',
      '-c:v', 'copy',
      '-c:a', 'aac',
      '-b:a', '192k',
      '-t', durations.videoSec.toFixed(3),
      '-movflags', '+faststart',
    ])
  return runToFile(cmd, outputPath)
}

/** Composer backed by a local ffmpeg; output is served from the temp dir by the download route. */
export class FfmpegComposer implements Composer {
  constructor(private readonly outputDir: string = tempDir) {}

  async compose(video: IngestedVideo, audio: AudioArtifact): Promise<ComposedVideo> {
    const log = getLogger('worker')
    const fileName = `dub-${uuidv4()}.mp4`
    const outputPath = path.join(this.outputDir, fileName)
    try {
      const audioSec = audio.durationSec ?? (await getMediaDuration(audio.path))
      const videoSec = video.durationSec > 0 ? video.durationSec : await getMediaDuration(video.reference)
      log.info({ msg: 'Composing dubbed video', audioSec, videoSec, output: fileName })
      await replaceAudioTrack(video.reference, audio.path, outputPath, { videoSec, audioSec })
      return { reference: `/api/download/${fileName}` }
    } catch (err) {
      await fs.promises.rm(outputPath, { force: true })
      throw new CompositionError(errorMessage(err), { cause: err })
    }
  }
}
