import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { cleanupFiles, removeFiles } from './fileCleanup'
import { isPathWithinDir } from './pathWithinDir'

describe('temp file handling', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cleanup-test-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('deletes only old files the pipeline owns', () => {
    const old = path.join(dir, 'dub-old.mp4')
    const fresh = path.join(dir, 'dub-fresh.mp4')
    const foreign = path.join(dir, 'other.mp4')
    for (const f of [old, fresh, foreign]) fs.writeFileSync(f, 'x')
    const now = Date.now()
    const twoHoursAgo = new Date(now - 2 * 60 * 60 * 1000)
    fs.utimesSync(old, twoHoursAgo, twoHoursAgo)
    fs.utimesSync(foreign, twoHoursAgo, twoHoursAgo)

    expect(cleanupFiles(dir, now)).toBe(1)
    expect(fs.readdirSync(dir).sort()).toEqual(['dub-fresh.mp4', 'other.mp4'])
  })

  it('returns 0 for a missing directory', () => {
    expect(cleanupFiles(path.join(dir, 'nope'))).toBe(0)
  })

  it('removes listed files and tolerates missing ones', async () => {
    const a = path.join(dir, 'dub-a.mp3')
    fs.writeFileSync(a, 'x')
    await removeFiles([a, path.join(dir, 'dub-missing.mp3')])
    expect(fs.existsSync(a)).toBe(false)
  })
})

describe('isPathWithinDir', () => {
  it('accepts children and rejects traversal or sibling prefixes', () => {
    expect(isPathWithinDir('/tmp', '/tmp/dub-1.mp4')).toBe(true)
    expect(isPathWithinDir('/tmp', '/tmp/../etc/passwd')).toBe(false)
    expect(isPathWithinDir('/tmp', '/tmp-other/dub-1.mp4')).toBe(false)
    expect(isPathWithinDir('/tmp', '/tmp')).toBe(false)
  })
})
