import type { ILogger } from '@sirat/logger'
import { parseEquityList, parseOrgList, readJsonFile } from '../../import/lists.js'
import type { ScoringRepository } from '../../repository/scoring-repository.js'
import { loggers } from '../../config/logger.js'

export interface ImportListsOptions {
  orgBlocklistFile?: string
  equityFile?: string
}

export interface ImportSummary {
  orgBlocklist: number
  equity: number
}

export async function runImportListsCommand(
  options: ImportListsOptions,
  repository: Pick<ScoringRepository, 'upsertOrgBlocklist' | 'upsertEquity'>,
  read: (path: string) => Promise<unknown> = readJsonFile,
  log: ILogger = loggers.cli
): Promise<ImportSummary> {
  const summary: ImportSummary = { orgBlocklist: 0, equity: 0 }

  if (options.orgBlocklistFile) {
    const records = parseOrgList(await read(options.orgBlocklistFile))
    summary.orgBlocklist = await repository.upsertOrgBlocklist(records)
    log.info('Org blocklist imported', { file: options.orgBlocklistFile, domains: summary.orgBlocklist })
  }

  if (options.equityFile) {
    const records = parseEquityList(await read(options.equityFile))
    summary.equity = await repository.upsertEquity(records)
    log.info('Equity list imported', { file: options.equityFile, domains: summary.equity })
  }

  return summary
}
