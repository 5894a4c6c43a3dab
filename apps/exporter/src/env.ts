/**
 * Environment loader - import before anything that reads process.env
 *
 * Loads apps/exporter/.env outside production. Production injects
 * variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env', import.meta.url)) })
}
