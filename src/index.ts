#!/usr/bin/env node
import 'dotenv/config'
import { resolveRunConfig } from './config/run-config.js'
import { runPipeline } from './services/pipeline.service.js'
import { isRelayError } from './types/errors.js'
import { createLogger } from './utils/logger.js'

/**
 * Runs the relay once and reports the outcome through the exit code:
 * 1 when the run aborted, 0 otherwise (failed deliveries included).
 *
 * The exit code is set rather than forced so pino transports can flush.
 */
async function main(): Promise<void> {
  let config: ReturnType<typeof resolveRunConfig>
  try {
    config = resolveRunConfig(process.env)
  } catch (error) {
    const log = createLogger()
    log.fatal(
      { error, code: isRelayError(error) ? error.code : undefined },
      'Invalid configuration',
    )
    process.exitCode = 1
    return
  }

  const log = createLogger({
    level: config.logLevel,
    destination: config.logDestination,
  })

  const summary = await runPipeline(config, { log })
  if (summary.state === 'aborted') {
    process.exitCode = 1
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected failure:', error)
  process.exitCode = 1
})
