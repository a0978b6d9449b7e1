import cron, { type ScheduledTask } from 'node-cron'

import { ConfigError, errorMessage } from './errors.js'
import { logger } from './logger.js'
import type { CrawlRun, RunTrigger } from './types/types.js'

/**
 * The part of IngestionPipeline the scheduler drives
 */
export interface RunnablePipeline {
  run(trigger: RunTrigger, signal?: AbortSignal): Promise<CrawlRun>
}

// Longest delay setInterval accepts
const MAX_TIMER_MS = 2 ** 31 - 1

/**
 * Converts a fixed interval into a six-field node-cron expression
 * @returns The expression, or null when cron cannot express the interval
 *   (it must divide a minute, an hour or a day evenly)
 * @throws ConfigError for an interval that is not a positive whole number of seconds
 */
export function intervalToCronExpression(seconds: number): string | null {
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new ConfigError(`Interval must be a positive whole number of seconds, got ${seconds}`)
  }
  if (seconds < 60) {
    if (60 % seconds === 0) return seconds === 1 ? '* * * * * *' : `*/${seconds} * * * * *`
  } else if (seconds < 3600) {
    const minutes = seconds / 60
    if (Number.isInteger(minutes) && 60 % minutes === 0) return `0 */${minutes} * * * *`
  } else if (seconds < 86400) {
    const hours = seconds / 3600
    if (Number.isInteger(hours) && 24 % hours === 0) return `0 0 */${hours} * * *`
  } else if (seconds === 86400) {
    return '0 0 0 * * *'
  }
  return null
}

/**
 * Fires the pipeline on a fixed interval, never running two crawls at once.
 * Intervals cron can express run on node-cron, aligned to the clock; any other interval
 * runs on a repeating timer counted from start().
 */
export class Scheduler {
  private readonly expression: string | null
  private readonly intervalMs: number
  private task: ScheduledTask | null = null
  private timer: NodeJS.Timeout | null = null
  private active: Promise<CrawlRun> | null = null
  private controller: AbortController | null = null
  private skipped = 0

  constructor(
    private readonly pipeline: RunnablePipeline,
    intervalSeconds: number,
  ) {
    this.expression = intervalToCronExpression(intervalSeconds)
    this.intervalMs = intervalSeconds * 1000
    if (!this.expression && this.intervalMs > MAX_TIMER_MS) {
      throw new ConfigError(`Interval of ${intervalSeconds}s is longer than a timer can wait`)
    }
  }

  get isRunning(): boolean {
    return this.active !== null
  }

  /** Triggers dropped because a run was still in progress */
  get skippedTriggers(): number {
    return this.skipped
  }

  /**
   * Starts the interval task
   * @param runOnStart - Also fire one run immediately
   */
  start(runOnStart = false): void {
    if (this.task || this.timer) return
    const onTick = () => {
      void this.trigger('interval')
    }
    if (this.expression) {
      this.task = cron.schedule(this.expression, onTick)
      logger.info(`Scheduler started (${this.expression})`)
    } else {
      this.timer = setInterval(onTick, this.intervalMs)
      logger.info(`Scheduler started (every ${this.intervalMs / 1000}s)`)
    }
    if (runOnStart) void this.trigger('startup')
  }

  /**
   * Starts a run unless one is already in flight
   * @returns The finished run, or null when the trigger was skipped
   */
  async trigger(source: RunTrigger = 'manual'): Promise<CrawlRun | null> {
    if (this.active) {
      this.skipped++
      logger.warn(`Skipping ${source} trigger: previous run still in progress`)
      return null
    }

    const controller = new AbortController()
    this.controller = controller
    const active = this.pipeline.run(source, controller.signal)
    this.active = active

    try {
      return await active
    } catch (error) {
      logger.error(`Scheduled run failed: ${errorMessage(error)}`)
      return null
    } finally {
      this.active = null
      this.controller = null
    }
  }

  /**
   * Aborts the run in flight, if any
   */
  cancel(): void {
    if (!this.controller) return
    logger.info('Cancelling the active run')
    this.controller.abort()
  }

  /**
   * Stops the interval task, cancels the active run and waits for it to wind down
   */
  async stop(): Promise<void> {
    if (this.task || this.timer) {
      this.task?.stop()
      this.task = null
      if (this.timer) clearInterval(this.timer)
      this.timer = null
      logger.info('Scheduler stopped')
    }

    const active = this.active
    if (!active) return
    this.cancel()
    try {
      await active
    } catch (error) {
      logger.error(`Run ended with an error while stopping: ${errorMessage(error)}`)
    }
  }
}
