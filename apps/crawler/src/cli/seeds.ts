import { readFile } from 'fs/promises'

/**
 * One URL per line; blank lines and `#` comments are skipped.
 */
export function parseSeedList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
}

export async function loadSeedFile(path: string): Promise<string[]> {
  return parseSeedList(await readFile(path, 'utf-8'))
}

export interface SeedResult {
  total: number
  admitted: number
}

/**
 * Push seeds through the normal admission policy (blocklist, already-crawled, already-queued).
 */
export async function seedFrontier(frontier: { enqueue(url: string): Promise<boolean> }, urls: string[]): Promise<SeedResult> {
  let admitted = 0
  for (const url of urls) {
    if (await frontier.enqueue(url)) admitted++
  }
  return { total: urls.length, admitted }
}
