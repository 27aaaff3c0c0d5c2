import type { ILogger } from '@sirat/logger'

/**
 * Outcome of one scoring dimension. A degraded result still carries the
 * score the composite uses.
 */
export type DimensionResult<D> = { ok: true; score: number; details: D } | { ok: false; score: number; reason: string }

export function scored<D>(score: number, details: D): DimensionResult<D> {
  return { ok: true, score, details }
}

export function degraded<D>(score: number, reason: string): DimensionResult<D> {
  return { ok: false, score, reason }
}

/**
 * Run a dimension, converting a thrown error into a degraded result at `fallbackScore`.
 */
export async function guard<D>(
  dimension: string,
  fallbackScore: number,
  log: ILogger,
  run: () => Promise<DimensionResult<D>>
): Promise<DimensionResult<D>> {
  try {
    return await run()
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    log.warn('Dimension degraded', { dimension, fallbackScore, reason }, error)
    return degraded(fallbackScore, reason)
  }
}
