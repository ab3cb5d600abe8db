import fs from 'fs'
import { execFile } from 'child_process'
import { promisify } from 'util'
import { pipeline } from 'stream/promises'
import https from 'https'
import http from 'http'
import { URL, fileURLToPath } from 'url'
import { PROVIDER_TIMEOUT_MS } from '../utils/queueConfig'

const execFileAsync = promisify(execFile)

const MAX_REDIRECTS = 5
/** yt-dlp gets longer than a single API call: it downloads the whole video. */
const YTDLP_TIMEOUT_MS = 10 * 60 * 1000

export function isYouTubeUrl(url: string): boolean {
  try {
    const host = new URL(url).hostname.toLowerCase()
    return host === 'youtu.be' || host === 'youtube.com' || host.endsWith('.youtube.com')
  } catch {
    return false
  }
}

export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

/** A plain filesystem path (or file:// URL) that points at an existing file. */
export function toLocalSourcePath(reference: string): string | undefined {
  let candidate = reference
  if (reference.startsWith('file://')) {
    try {
      candidate = fileURLToPath(reference)
    } catch {
      return undefined
    }
  } else if (/^[a-z][a-z0-9+.-]*:\/\//i.test(reference)) {
    return undefined
  }
  try {
    return fs.statSync(candidate).isFile() ? candidate : undefined
  } catch {
    return undefined
  }
}

/**
 * Download a video from a URL. YouTube goes through yt-dlp (must be on PATH or YTDLP_PATH);
 * anything else is fetched directly over HTTP(S), following redirects. An existing local file is copied.
 */
export async function downloadVideoFromURL(url: string, outputPath: string): Promise<string> {
  if (!isHttpUrl(url)) {
    const localPath = toLocalSourcePath(url)
    if (!localPath) {
      throw new Error(`Unsupported source URL: ${url}`)
    }
    await fs.promises.copyFile(localPath, outputPath)
    return outputPath
  }
  if (isYouTubeUrl(url)) {
    const ytDlpCmd = process.env.YTDLP_PATH?.trim() || 'yt-dlp'
    try {
      await execFileAsync(ytDlpCmd, ['-f', 'best[ext=mp4]/best', '-o', outputPath, '--no-playlist', url], {
        timeout: YTDLP_TIMEOUT_MS,
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new Error(`Failed to download video from YouTube: ${reason}`)
    }
    if (!fs.existsSync(outputPath)) {
      throw new Error('yt-dlp finished without producing a file')
    }
    return outputPath
  }
  await httpDownload(url, outputPath, MAX_REDIRECTS, PROVIDER_TIMEOUT_MS)
  return outputPath
}

function openResponse(url: string, timeoutMs: number): Promise<http.IncomingMessage> {
  return new Promise((resolve, reject) => {
    const protocol = new URL(url).protocol === 'https:' ? https : http
    const req = protocol.get(url, { timeout: timeoutMs }, resolve)
    // Idle socket, before or after headers; destroying the request also aborts the response body
    req.on('timeout', () => {
      req.destroy(new Error(`Download timed out after ${timeoutMs}ms`))
    })
    req.on('error', reject)
  })
}

export async function httpDownload(
  url: string,
  outputPath: string,
  redirectsLeft: number = MAX_REDIRECTS,
  timeoutMs: number = PROVIDER_TIMEOUT_MS
): Promise<void> {
  const response = await openResponse(url, timeoutMs)
  const status = response.statusCode ?? 0
  const location = response.headers.location
  if (status >= 300 && status < 400 && location) {
    response.resume()
    if (redirectsLeft <= 0) {
      throw new Error('Too many redirects')
    }
    return httpDownload(new URL(location, url).toString(), outputPath, redirectsLeft - 1, timeoutMs)
  }
  if (status !== 200) {
    response.resume()
    throw new Error(`Failed to download: HTTP ${status}`)
  }

  try {
    await pipeline(response, fs.createWriteStream(outputPath))
  } catch (err) {
    await fs.promises.rm(outputPath, { force: true })
    throw err
  }
}
