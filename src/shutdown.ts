import { errorMessage } from './errors.js'
import { logger } from './logger.js'
import type { RunnablePipeline } from './scheduler.js'
import type { CrawlRun } from './types/types.js'

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const

export interface ClosablePipeline extends RunnablePipeline {
  close(): Promise<void>
}

/**
 * Runs `handler` once, on the first SIGINT or SIGTERM
 * @param emitter - Where the signals arrive, the process outside of tests
 */
export function onShutdownSignal(
  handler: (signal: NodeJS.Signals) => Promise<void>,
  emitter: NodeJS.EventEmitter = process,
): void {
  let shuttingDown = false
  for (const signal of SHUTDOWN_SIGNALS) {
    emitter.on(signal, () => {
      if (shuttingDown) return
      shuttingDown = true
      logger.info(`Received ${signal}, shutting down`)
      handler(signal).catch((error) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`)
        process.exitCode = 1
      })
    })
  }
}

/**
 * Runs the pipeline a single time. A shutdown signal cancels the run, which still
 * reports before the pipeline is closed.
 */
export async function runOnce(
  pipeline: ClosablePipeline,
  emitter: NodeJS.EventEmitter = process,
): Promise<CrawlRun> {
  const controller = new AbortController()
  onShutdownSignal(async () => {
    controller.abort()
  }, emitter)

  try {
    return await pipeline.run('manual', controller.signal)
  } finally {
    await pipeline.close()
  }
}
