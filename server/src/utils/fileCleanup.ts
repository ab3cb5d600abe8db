import fs from 'fs'
import path from 'path'
import type pino from 'pino'
import { getLogger } from '../lib/logger'
import { tempDir } from './queueConfig'

const CLEANUP_INTERVAL = 60 * 60 * 1000 // 1 hour
const FILE_MAX_AGE = 60 * 60 * 1000 // 1 hour

/** Periodic sweep of old files in the temp dir (downloads, extracted audio, dubbed outputs). */
export function startFileCleanup(dir: string = tempDir): NodeJS.Timeout {
  cleanupFiles(dir)
  const timer = setInterval(() => cleanupFiles(dir), CLEANUP_INTERVAL)
  timer.unref()
  return timer
}

/** Owned files only: everything the pipeline writes is prefixed with "dub-". */
export function cleanupFiles(dir: string, now: number = Date.now(), maxAgeMs: number = FILE_MAX_AGE): number {
  const log = getLogger('worker')
  if (!fs.existsSync(dir)) {
    return 0
  }

  let deletedCount = 0
  for (const file of fs.readdirSync(dir)) {
    if (!file.startsWith('dub-')) continue
    const filePath = path.join(dir, file)
    try {
      const stats = fs.lstatSync(filePath)
      if (stats.isSymbolicLink() || !stats.isFile()) continue
      if (now - stats.mtimeMs > maxAgeMs) {
        fs.unlinkSync(filePath)
        deletedCount++
      }
    } catch (err) {
      log.warn({ msg: 'Temp file cleanup failed', file, err })
    }
  }

  if (deletedCount > 0) {
    log.info({ msg: 'File cleanup', deletedCount })
  }
  return deletedCount
}

/** Remove a job's intermediate files. Missing files are fine; other failures are logged. */
export async function removeFiles(paths: readonly string[], log: pino.Logger = getLogger('worker')): Promise<void> {
  const results = await Promise.allSettled(paths.map((p) => fs.promises.rm(p, { force: true })))
  results.forEach((r, i) => {
    if (r.status === 'rejected') {
      log.warn({ msg: 'Failed to remove temp file', file: path.basename(paths[i]), err: r.reason })
    }
  })
}
