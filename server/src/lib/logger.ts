/**
 * Structured JSON logger for API and pipeline worker. Single format: level, timestamp, service, env, release, requestId/jobId.
 * Redacts provider keys and auth headers. Use LOG_LEVEL=debug only when needed (off by default).
 */
import pino from 'pino'

const release = process.env.RELEASE || 'dev'
const env = process.env.NODE_ENV || 'development'
const level = process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info')

/** Keys (and nested paths) to redact from log output. */
const REDACT_PATHS = [
  'apiKey',
  'api_key',
  'authorization',
  'cookie',
  'req.headers.authorization',
  'req.headers.cookie',
  'headers["xi-api-key"]',
  'OPENAI_API_KEY',
  'ELEVENLABS_API_KEY',
  'SENTRY_DSN',
]

export type ServiceName = 'api' | 'worker'

function createBaseLogger(service: ServiceName): pino.Logger {
  return pino({
    level,
    base: { service, env, release },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

let apiLogger: pino.Logger | undefined
let workerLogger: pino.Logger | undefined

export function getLogger(service: ServiceName): pino.Logger {
  if (service === 'api') {
    if (!apiLogger) apiLogger = createBaseLogger('api')
    return apiLogger
  }
  if (!workerLogger) workerLogger = createBaseLogger('worker')
  return workerLogger
}

/** Child logger with requestId (for API request context). */
export function withRequestId(requestId: string | undefined): pino.Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Child logger with jobId and requestId (for pipeline job context). */
export function withJobContext(jobId: string, requestId?: string): pino.Logger {
  return getLogger('worker').child({ jobId, requestId: requestId || undefined })
}

/** Redact a path for safe logging: keep basename only. */
export function redactFilePath(filePath: string): string {
  if (!filePath) return '[REDACTED]'
  const parts = filePath.replace(/\\/g, '/').split('/')
  return parts[parts.length - 1] || '[REDACTED]'
}
