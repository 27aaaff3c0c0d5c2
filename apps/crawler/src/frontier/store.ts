/**
 * Frontier store: FIFO list of normalized URLs plus a companion membership set.
 *
 * `push` records membership and appends in one step; a URL already in the set
 * is never queued again. Popping leaves the set untouched, so a URL is queued
 * at most once until `clear()`.
 */

export interface FrontierStats {
  queueSize: number
  setSize: number
}

export interface FrontierStore {
  /** Append unless already a member. Returns true when the URL was queued. */
  push(url: string): Promise<boolean>
  /** Oldest queued URL, or null when the queue is empty. */
  pop(): Promise<string | null>
  size(): Promise<number>
  isQueued(url: string): Promise<boolean>
  /** Drop the queue and the membership set. */
  clear(): Promise<void>
  stats(): Promise<FrontierStats>
}

/**
 * Single-process store for tests and local runs.
 */
export class InMemoryFrontierStore implements FrontierStore {
  private readonly queue: string[] = []
  private readonly members = new Set<string>()

  async push(url: string): Promise<boolean> {
    if (this.members.has(url)) return false
    this.members.add(url)
    this.queue.push(url)
    return true
  }

  async pop(): Promise<string | null> {
    return this.queue.shift() ?? null
  }

  async size(): Promise<number> {
    return this.queue.length
  }

  async isQueued(url: string): Promise<boolean> {
    return this.members.has(url)
  }

  async clear(): Promise<void> {
    this.queue.length = 0
    this.members.clear()
  }

  async stats(): Promise<FrontierStats> {
    return { queueSize: this.queue.length, setSize: this.members.size }
  }
}
