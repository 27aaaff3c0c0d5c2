/**
 * Scorer Logger Configuration
 */

import { createLogger } from '@sirat/logger'

export const logger = createLogger('scorer')

export const loggers = {
  composite: logger.child('composite'),
  alignment: logger.child('alignment'),
  quality: logger.child('quality'),
  authority: logger.child('authority'),
  equity: logger.child('equity'),
  orgBlocklist: logger.child('org-blocklist'),
  media: logger.child('media'),
  db: logger.child('db'),
  cli: logger.child('cli'),
}
