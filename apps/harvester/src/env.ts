/**
 * Environment loader - import first, before anything reads process.env.
 *
 * Loads apps/harvester/.env.local outside production. Scheduled runs inject
 * variables directly and never read a file.
 */
import { config } from 'dotenv'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

if (process.env.NODE_ENV !== 'production') {
  const here = dirname(fileURLToPath(import.meta.url))
  config({ path: resolve(here, '..', '.env.local') })
}
