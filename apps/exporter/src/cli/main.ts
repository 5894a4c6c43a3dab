#!/usr/bin/env tsx
import '../env.js'
import { rootLogger } from '../config/logger.js'
import { EXIT_FAILURE, runCli } from './index.js'

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    rootLogger.fatal('Unexpected error', {}, error)
    process.exitCode = EXIT_FAILURE
  })
