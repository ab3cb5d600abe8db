import './env'
import path from 'path'
import { initSentry } from './lib/sentry'

initSentry()
import { createApp } from './app'
import { getLogger } from './lib/logger'
import { JobStore } from './models/Job'
import { DubbingOrchestrator } from './services/dubbing'
import { FfmpegComposer } from './services/ffmpeg'
import { WhisperTranscriber } from './services/transcription'
import { OpenAITranslator } from './services/translation'
import { ElevenLabsSynthesizer } from './services/voice'
import { startFileCleanup } from './utils/fileCleanup'
import { JOB_EVICTION_INTERVAL_MS, JOB_RETENTION_MINUTES, MAX_CONCURRENT_JOBS } from './utils/queueConfig'
import { JobRunner } from './workers/jobRunner'

const log = getLogger('api')
const PORT = Number(process.env.PORT) || 3001
/** How long shutdown waits for running pipelines before exiting anyway. */
const SHUTDOWN_DEADLINE_MS = 30 * 1000

const store = new JobStore({ retentionMs: JOB_RETENTION_MINUTES * 60 * 1000 })
const runner = new JobRunner(MAX_CONCURRENT_JOBS)
const synthesizer = new ElevenLabsSynthesizer()
const orchestrator = new DubbingOrchestrator({
  store,
  runner,
  adapters: {
    transcriber: new WhisperTranscriber(),
    translator: new OpenAITranslator(),
    synthesizer,
    composer: new FfmpegComposer(),
  },
})

const app = createApp({
  orchestrator,
  store,
  runner,
  clientDist: process.env.CLIENT_DIST || path.join(__dirname, '../../dist'),
})

const evictionTimer = setInterval(() => {
  const removed = store.evictExpired()
  if (removed > 0) log.info({ msg: 'Evicted finished jobs', removed, remaining: store.size })
}, JOB_EVICTION_INTERVAL_MS)
evictionTimer.unref()

const server = app.listen(PORT, () => {
  log.info({
    msg: 'Server listening',
    port: PORT,
    maxConcurrentJobs: MAX_CONCURRENT_JOBS || 'unlimited',
    voiceSynthesis: synthesizer.available ? 'enabled' : 'demo mode',
  })
  startFileCleanup()
  log.info({ msg: 'File cleanup cron started' })
})

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    log.fatal({ msg: `Port ${PORT} is already in use; change PORT in .env`, port: PORT })
  } else {
    log.fatal({ msg: 'Server error', err: error })
  }
  process.exit(1)
})

let shuttingDown = false

/** Stop accepting requests, give running pipelines a bounded window to finish, then exit. */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  log.info({ msg: `${signal} received, shutting down gracefully`, active: runner.activeCount, pending: runner.pendingCount })
  clearInterval(evictionTimer)
  server.close()
  const deadline = new Promise<'timeout'>((resolve) => setTimeout(() => resolve('timeout'), SHUTDOWN_DEADLINE_MS).unref())
  const outcome = await Promise.race([runner.onIdle().then(() => 'idle' as const), deadline])
  if (outcome === 'timeout') {
    log.warn({ msg: 'Shutdown deadline reached with jobs still running', active: runner.activeCount })
  }
  log.info({ msg: 'Server closed' })
  process.exit(0)
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM')
})

process.on('SIGINT', () => {
  void shutdown('SIGINT')
})
