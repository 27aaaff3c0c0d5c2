/**
 * Crawler Logger Configuration
 *
 * Pre-configured loggers for crawler components
 */

import { createLogger } from '@sirat/logger'

// Root logger for the crawler service
export const logger = createLogger('crawler')

export const loggers = {
  frontier: logger.child('frontier'),
  robots: logger.child('robots'),
  fetch: logger.child('fetch'),
  worker: logger.child('worker'),
  db: logger.child('db'),
  redis: logger.child('redis'),
  cli: logger.child('cli'),
}
