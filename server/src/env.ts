/**
 * Load env before any module that reads process.env at import time (logger, sentry, ffmpeg paths).
 * Must be the first import in index.ts.
 */
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'

// cwd .env first, then the project root .env; existing variables always win
const cwdEnv = path.join(process.cwd(), '.env')
const rootEnv = path.join(__dirname, '..', '..', '.env')
for (const file of [cwdEnv, rootEnv]) {
  if (fs.existsSync(file)) {
    dotenv.config({ path: file, override: false })
  }
}
