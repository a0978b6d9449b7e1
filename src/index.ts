#!/usr/bin/env node

import commandLineArgs from 'command-line-args'
import * as dotenv from 'dotenv'

import { loadConfig } from './config.js'
import { errorMessage } from './errors.js'
import { logger, LogLevel } from './logger.js'
import { IngestionPipeline } from './pipeline.js'
import { Scheduler } from './scheduler.js'
import { onShutdownSignal, runOnce } from './shutdown.js'
import type { CommandLineOptions } from './types/types.js'

const optionDefinitions = [
  { name: 'url', alias: 'u', type: String },
  { name: 'db-path', alias: 'd', type: String },
  { name: 'once', alias: 'o', type: Boolean },
  { name: 'verbose', alias: 'v', type: Boolean },
  { name: 'help', alias: 'h', type: Boolean },
]

const USAGE = 'Usage: pond-crawler [--url <forum-section-url>] [--db-path <db-path>] [--once] [--verbose]'

function readOptions(): CommandLineOptions & { help?: boolean } {
  const parsed = commandLineArgs(optionDefinitions, { camelCase: true })
  const text = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined)
  return {
    url: text(parsed.url),
    dbPath: text(parsed.dbPath),
    once: parsed.once === true,
    verbose: parsed.verbose === true,
    help: parsed.help === true,
  }
}

async function main() {
  dotenv.config()

  const options = readOptions()
  if (options.help) {
    console.log(USAGE)
    return
  }

  const config = loadConfig({
    ...process.env,
    ...(options.url ? { FORUM_ROOT_URL: options.url } : {}),
    ...(options.dbPath ? { DB_PATH: options.dbPath } : {}),
  })

  logger.setLevel(options.verbose ? LogLevel.DEBUG : config.logLevel)
  if (options.verbose) logger.debug('Verbose logging enabled.')

  logger.info(`Crawling ${config.forumRootUrl} into ${config.dbPath}`)
  const pipeline = await IngestionPipeline.create(config)

  if (options.once) {
    const run = await runOnce(pipeline)
    process.exitCode = run.status === 'completed' ? 0 : 1
    return
  }

  const scheduler = new Scheduler(pipeline, config.fetchIntervalSeconds)
  onShutdownSignal(async () => {
    try {
      await scheduler.stop()
    } finally {
      await pipeline.close()
    }
  })

  scheduler.start(true)
}

// Add error handling for unhandled rejections
process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason)
  process.exit(1)
})

main().catch((error) => {
  logger.error(`Error in main: ${errorMessage(error)}`)
  process.exit(1)
})
