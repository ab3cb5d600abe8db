import type pino from 'pino'
import { getLogger } from '../lib/logger'

export type JobTask = () => Promise<void>

/**
 * In-process replacement for the queue worker: tasks start on a later tick so the caller
 * returns first, and at most `concurrency` run at once (0 = unlimited). Task failures are
 * logged here; the dubbing pipeline already turns stage failures into job state.
 */
export class JobRunner {
  private readonly pending: JobTask[] = []
  private active = 0
  private idleWaiters: Array<() => void> = []
  private readonly log: pino.Logger

  constructor(private readonly concurrency = 0, log?: pino.Logger) {
    this.log = log ?? getLogger('worker')
  }

  enqueue(task: JobTask): void {
    this.pending.push(task)
    setImmediate(() => this.drain())
  }

  get activeCount(): number {
    return this.active
  }

  get pendingCount(): number {
    return this.pending.length
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0
  }

  private hasCapacity(): boolean {
    return this.concurrency <= 0 || this.active < this.concurrency
  }

  private drain(): void {
    while (this.hasCapacity()) {
      const task = this.pending.shift()
      if (!task) break
      this.active++
      void this.run(task)
    }
  }

  private async run(task: JobTask): Promise<void> {
    try {
      await task()
    } catch (err) {
      this.log.error({ msg: 'Background task crashed', err })
    } finally {
      this.active--
      this.drain()
      if (this.isIdle()) {
        const waiters = this.idleWaiters
        this.idleWaiters = []
        waiters.forEach((resolve) => resolve())
      }
    }
  }
}
