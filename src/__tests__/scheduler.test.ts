import cron from 'node-cron'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

import { ConfigError } from '../errors.js'
import { intervalToCronExpression, Scheduler } from '../scheduler.js'
import type { CrawlRun, RunTrigger } from '../types/types.js'

const { task } = vi.hoisted(() => ({ task: { start: vi.fn(), stop: vi.fn() } }))

vi.mock('node-cron', () => ({
  default: { schedule: vi.fn().mockReturnValue(task) },
}))

function finishedRun(trigger: RunTrigger, status: CrawlRun['status'] = 'completed'): CrawlRun {
  return {
    runId: 'run-1',
    trigger,
    startedAt: new Date('2024-05-01T10:00:00.000Z'),
    finishedAt: new Date('2024-05-01T10:01:00.000Z'),
    status,
    pagesFetched: 0,
    pagesSkipped: 0,
    topicsSeen: 0,
    topicsUpserted: 0,
    postsUpserted: 0,
    postsUnchanged: 0,
    postsSkippedDeleted: 0,
    geocodeCalls: 0,
    geocodeUpdated: 0,
    geocodeRejected: 0,
    parseWarnings: 0,
    errors: [],
  }
}

/**
 * A pipeline whose runs last until the test finishes them or aborts them
 */
function controllablePipeline() {
  const pending: Array<() => void> = []
  const run = vi.fn(
    (trigger: RunTrigger, signal?: AbortSignal) =>
      new Promise<CrawlRun>((resolve) => {
        pending.push(() => resolve(finishedRun(trigger)))
        signal?.addEventListener('abort', () => resolve(finishedRun(trigger, 'cancelled')))
      }),
  )
  const finishAll = () => pending.splice(0).forEach((finish) => finish())
  return { pipeline: { run }, run, finishAll }
}

describe('intervalToCronExpression', () => {
  it.each([
    [1, '* * * * * *'],
    [15, '*/15 * * * * *'],
    [60, '0 */1 * * * *'],
    [1800, '0 */30 * * * *'],
    [3600, '0 0 */1 * * *'],
    [21600, '0 0 */6 * * *'],
    [86400, '0 0 0 * * *'],
  ])('should express %i seconds as %s', (seconds, expression) => {
    expect(intervalToCronExpression(seconds)).toBe(expression)
  })

  it.each([7, 45, 90, 5400, 100_000, 172_800])('should leave %i seconds to a timer', (seconds) => {
    expect(intervalToCronExpression(seconds)).toBeNull()
  })

  it.each([0, -60, 2.5])('should reject %s seconds', (seconds) => {
    expect(() => intervalToCronExpression(seconds)).toThrow(ConfigError)
  })
})

describe('Scheduler', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should register a cron task for the interval', () => {
    const { pipeline } = controllablePipeline()
    const scheduler = new Scheduler(pipeline, 1800)

    scheduler.start()

    expect(cron.schedule).toHaveBeenCalledWith('0 */30 * * * *', expect.any(Function))
  })

  it('should fire an interval run from the cron callback', async () => {
    const { pipeline, run, finishAll } = controllablePipeline()
    const scheduler = new Scheduler(pipeline, 60)
    scheduler.start()

    const [, onTick] = vi.mocked(cron.schedule).mock.calls[0]
    expect(typeof onTick).toBe('function')
    if (typeof onTick !== 'function') return
    onTick(new Date())

    expect(run).toHaveBeenCalledWith('interval', expect.any(AbortSignal))
    finishAll()
    await scheduler.stop()
  })

  it('should run at once when asked to', async () => {
    const { pipeline, run, finishAll } = controllablePipeline()
    const scheduler = new Scheduler(pipeline, 60)

    scheduler.start(true)

    expect(run).toHaveBeenCalledWith('startup', expect.any(AbortSignal))
    finishAll()
    await scheduler.stop()
  })

  it('should skip triggers while a run is in flight', async () => {
    const { pipeline, run, finishAll } = controllablePipeline()
    const scheduler = new Scheduler(pipeline, 60)

    const first = scheduler.trigger('manual')
    const second = await scheduler.trigger('interval')

    expect(second).toBeNull()
    expect(scheduler.skippedTriggers).toBe(1)
    expect(scheduler.isRunning).toBe(true)
    expect(run).toHaveBeenCalledTimes(1)

    finishAll()
    await expect(first).resolves.toMatchObject({ trigger: 'manual', status: 'completed' })
    expect(scheduler.isRunning).toBe(false)
  })

  it('should accept a new trigger after the previous run finished', async () => {
    const { pipeline, run, finishAll } = controllablePipeline()
    const scheduler = new Scheduler(pipeline, 60)

    const first = scheduler.trigger('manual')
    finishAll()
    await first
    const second = scheduler.trigger('manual')
    finishAll()

    await expect(second).resolves.toMatchObject({ status: 'completed' })
    expect(run).toHaveBeenCalledTimes(2)
    expect(scheduler.skippedTriggers).toBe(0)
  })

  it('should cancel the active run and wait for it on stop', async () => {
    const { pipeline } = controllablePipeline()
    const scheduler = new Scheduler(pipeline, 60)
    scheduler.start()

    const active = scheduler.trigger('manual')
    await scheduler.stop()

    expect(task.stop).toHaveBeenCalledTimes(1)
    await expect(active).resolves.toMatchObject({ status: 'cancelled' })
    expect(scheduler.isRunning).toBe(false)
  })

  describe('intervals cron cannot express', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    afterEach(() => {
      vi.useRealTimers()
    })

    it('should fire every interval from a timer and stop firing once stopped', async () => {
      const { pipeline, run, finishAll } = controllablePipeline()
      const scheduler = new Scheduler(pipeline, 5400)
      scheduler.start()

      expect(cron.schedule).not.toHaveBeenCalled()
      vi.advanceTimersByTime(5_399_000)
      expect(run).not.toHaveBeenCalled()

      vi.advanceTimersByTime(1000)
      expect(run).toHaveBeenCalledTimes(1)
      expect(run).toHaveBeenCalledWith('interval', expect.any(AbortSignal))

      finishAll()
      await vi.advanceTimersByTimeAsync(5_400_000)
      expect(run).toHaveBeenCalledTimes(2)

      finishAll()
      await scheduler.stop()
      await vi.advanceTimersByTimeAsync(3 * 5_400_000)
      expect(run).toHaveBeenCalledTimes(2)
    })

    it('should reject an interval longer than a timer can wait', () => {
      const { pipeline } = controllablePipeline()
      expect(() => new Scheduler(pipeline, 30 * 86_400)).toThrow(ConfigError)
    })
  })

  it('should survive a pipeline that throws', async () => {
    const pipeline = { run: vi.fn().mockRejectedValue(new Error('boom')) }
    const scheduler = new Scheduler(pipeline, 60)

    await expect(scheduler.trigger('manual')).resolves.toBeNull()
    expect(scheduler.isRunning).toBe(false)
  })
})
