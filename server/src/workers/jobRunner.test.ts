import { describe, it, expect } from 'vitest'
import { JobRunner } from './jobRunner'

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve))

describe('JobRunner', () => {
  it('starts tasks on a later tick, not inside enqueue', async () => {
    const runner = new JobRunner()
    let started = false
    runner.enqueue(async () => {
      started = true
    })
    expect(started).toBe(false)
    expect(runner.pendingCount).toBe(1)
    await runner.onIdle()
    expect(started).toBe(true)
  })

  it('runs everything at once when unlimited', async () => {
    const runner = new JobRunner(0)
    const gate = deferred()
    runner.enqueue(() => gate.promise)
    runner.enqueue(() => gate.promise)
    runner.enqueue(() => gate.promise)
    await tick()
    expect(runner.activeCount).toBe(3)
    expect(runner.pendingCount).toBe(0)
    gate.resolve()
    await runner.onIdle()
    expect(runner.activeCount).toBe(0)
  })

  it('holds tasks beyond the concurrency limit until a slot frees up', async () => {
    const runner = new JobRunner(1)
    const first = deferred()
    const order: string[] = []
    runner.enqueue(async () => {
      order.push('first:start')
      await first.promise
      order.push('first:end')
    })
    runner.enqueue(async () => {
      order.push('second')
    })
    await tick()
    expect(runner.activeCount).toBe(1)
    expect(runner.pendingCount).toBe(1)
    expect(order).toEqual(['first:start'])

    first.resolve()
    await runner.onIdle()
    expect(order).toEqual(['first:start', 'first:end', 'second'])
  })

  it('keeps going after a task throws', async () => {
    const runner = new JobRunner(1)
    let ran = false
    runner.enqueue(async () => {
      throw new Error('boom')
    })
    runner.enqueue(async () => {
      ran = true
    })
    await runner.onIdle()
    expect(ran).toBe(true)
  })

  it('resolves onIdle immediately when nothing is queued', async () => {
    await expect(new JobRunner().onIdle()).resolves.toBeUndefined()
  })
})
