import express, { Request, Response } from 'express'
import path from 'path'
import fs from 'fs'
import { getLogger } from '../lib/logger'
import { isPathWithinDir } from '../utils/pathWithinDir'
import { tempDir } from '../utils/queueConfig'

/** Serves composed videos (`dub-*.mp4`) out of the temp dir. */
export function createDownloadRouter(dir: string = tempDir): express.Router {
  const router = express.Router()

  router.get('/:filename', (req: Request, res: Response) => {
    const { filename } = req.params
    const filePath = path.join(dir, filename)

    if (!isPathWithinDir(dir, filePath) || !filename.startsWith('dub-')) {
      res.status(403).json({ message: 'Access denied' })
      return
    }
    if (!fs.existsSync(filePath)) {
      res.status(404).json({ message: 'File not found' })
      return
    }

    // Header-safe filename: no CR/LF/control chars, ASCII only
    const asciiSafe = filename.replace(/[\0\r\n"]/g, '').replace(/[^\x20-\x7E]/g, '_')
    res.setHeader('Content-Disposition', `attachment; filename="${asciiSafe}"`)
    res.setHeader('Content-Type', filename.endsWith('.mp4') ? 'video/mp4' : 'application/octet-stream')

    const fileStream = fs.createReadStream(filePath)
    fileStream.on('error', (err) => {
      getLogger('api').error({ msg: 'Download stream failed', file: filename, err })
      if (!res.headersSent) res.status(500).json({ message: 'Download failed' })
      else res.destroy(err)
    })
    fileStream.pipe(res)
  })

  return router
}
