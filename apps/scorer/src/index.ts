#!/usr/bin/env node

/**
 * Scorer CLI
 *
 *   score --page-id <id>
 *   score --all [--limit <n>]
 *   score --unscored [--limit <n>]
 *   import-lists [--org-blocklist <file.json>] [--equity <file.json>]
 */

// Load environment variables first, before any other imports
import 'dotenv/config'

import { createPool, warmupDatabase, type Pool } from '@sirat/db'
import { logger, loggers } from './config/logger.js'
import { ConfigurationError, loadScorerSettings, type ScorerSettings } from './config/settings.js'
import { PgScoringRepository } from './repository/scoring-repository.js'
import { buildCompositeScorer } from './composite/build.js'
import { runScoreCommand, type ScoreTarget } from './cli/commands/score.js'
import { runImportListsCommand } from './cli/commands/import-lists.js'
import { asString, FlagError, parseFlags, parseScoreTarget, type Flags } from './cli/parse-flags.js'

const log = loggers.cli

function printHelp(): void {
  console.log('Scorer CLI')
  console.log('')
  console.log('Commands:')
  console.log('  score --page-id <id>            Score one page')
  console.log('  score --all [--limit <n>]       Re-score every page with content')
  console.log('  score --unscored [--limit <n>]  Score pages that have never been scored')
  console.log('  import-lists [--org-blocklist <file.json>] [--equity <file.json>]')
}

async function run(
  command: string,
  flags: Flags,
  target: ScoreTarget | null,
  settings: ScorerSettings,
  pool: Pool
): Promise<number> {
  const repository = new PgScoringRepository(pool)

  switch (command) {
    case 'score': {
      if (!target) {
        console.error('Error: one of --page-id, --all or --unscored is required')
        return 2
      }
      const { scorer, gateway } = buildCompositeScorer(settings, repository)
      const summary = await runScoreCommand(target, scorer, repository)
      log.info('Media literacy stats', { ...gateway.stats() })
      return target.kind === 'page' && summary.failed > 0 ? 1 : 0
    }
    case 'import-lists': {
      const orgBlocklistFile = asString(flags['org-blocklist'])
      const equityFile = asString(flags.equity)
      if (!orgBlocklistFile && !equityFile) {
        console.error('Error: --org-blocklist and/or --equity is required')
        return 2
      }
      await runImportListsCommand({ orgBlocklistFile, equityFile }, repository)
      return 0
    }
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return 2
  }
}

async function main(): Promise<number> {
  const { positionals, flags } = parseFlags(process.argv.slice(2))
  const command = positionals[0]
  if (!command || flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  let target: ScoreTarget | null = null
  if (command === 'score') {
    try {
      target = parseScoreTarget(flags)
    } catch (error) {
      if (error instanceof FlagError) {
        console.error(`Error: ${error.message}`)
        return 2
      }
      throw error
    }
  }

  let settings: ScorerSettings
  try {
    settings = loadScorerSettings()
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal('Invalid configuration', { issues: error.issues })
      return 1
    }
    throw error
  }

  const pool = createPool(settings.databaseUrl)
  try {
    if (!(await warmupDatabase(pool))) {
      logger.fatal('Startup failed', { reason: 'Database unavailable' })
      return 1
    }
    return await run(command, flags, target, settings, pool)
  } finally {
    await pool.end()
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.fatal('Scorer crashed', {}, error)
    process.exit(1)
  })
