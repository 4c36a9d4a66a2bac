// src/core/metrics.ts
import Database from 'better-sqlite3'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import { z } from 'zod'
import { createLogger } from './logger.js'
import type { SearchMode } from './types.js'

const log = createLogger({ name: 'metrics' })

/** One provider round trip, successful or not */
export interface SearchEvent {
  mode: SearchMode
  query: string
  elapsedMs: number
  /** Items on the returned page */
  pageCount?: number
  /** Provider-reported total across all pages */
  totalCount?: number
  /** Natural-language search ran on default filters because the answer was unusable */
  fallback?: boolean
  error?: string
}

export interface MetricsRecorder {
  record(event: SearchEvent): Promise<void>
}

/** Discards events; used when the metrics database cannot be opened */
export class NullMetrics implements MetricsRecorder {
  async record(): Promise<void> {
    return
  }
}

export interface ModeStats {
  mode: SearchMode
  searches: number
  failed: number
  /** Successful searches that matched nothing */
  empty: number
  fallbacks: number
  latencyMs: { p50: number; p95: number; p99: number }
}

const ModeRow = z.object({
  mode: z.enum(['natural', 'structured']),
  searches: z.number(),
  failed: z.number(),
  empty: z.number(),
  fallbacks: z.number(),
})

const Latencies = z.array(z.number())

export class SqliteMetrics implements MetricsRecorder {
  private readonly db: Database.Database

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true })
    this.db = new Database(dbPath)
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS search_events (
        ts          INTEGER NOT NULL,
        mode        TEXT    NOT NULL,
        query       TEXT    NOT NULL,
        elapsed_ms  INTEGER NOT NULL,
        page_count  INTEGER,
        total_count INTEGER,
        fallback    INTEGER NOT NULL DEFAULT 0,
        error       TEXT
      );
      CREATE INDEX IF NOT EXISTS search_events_ts ON search_events (ts);
    `)
  }

  async record(e: SearchEvent): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO search_events (ts, mode, query, elapsed_ms, page_count, total_count, fallback, error)
         VALUES (@ts, @mode, @query, @elapsedMs, @pageCount, @totalCount, @fallback, @error)`,
      )
      .run({
        ts: Math.floor(Date.now() / 1000),
        mode: e.mode,
        query: e.query,
        elapsedMs: Math.round(e.elapsedMs),
        pageCount: e.pageCount ?? null,
        totalCount: e.totalCount ?? null,
        fallback: e.fallback ? 1 : 0,
        error: e.error ?? null,
      })
  }

  /** Per-mode counters and latency percentiles over the last `windowSec` seconds */
  async stats(windowSec = 86_400): Promise<ModeStats[]> {
    const since = Math.floor(Date.now() / 1000) - windowSec
    const rows = z.array(ModeRow).parse(
      this.db
        .prepare(
          `SELECT mode,
                  COUNT(*)                                                AS searches,
                  COUNT(error)                                            AS failed,
                  COALESCE(SUM(error IS NULL AND total_count = 0), 0)     AS empty,
                  COALESCE(SUM(fallback), 0)                              AS fallbacks
           FROM search_events
           WHERE ts >= ?
           GROUP BY mode
           ORDER BY mode`,
        )
        .all(since),
    )
    const latencies = this.db.prepare(
      'SELECT elapsed_ms FROM search_events WHERE ts >= ? AND mode = ? ORDER BY elapsed_ms',
    )

    return rows.map((row) => {
      const sorted = Latencies.parse(latencies.pluck().all(since, row.mode))
      return {
        ...row,
        latencyMs: {
          p50: nearestRank(sorted, 0.5),
          p95: nearestRank(sorted, 0.95),
          p99: nearestRank(sorted, 0.99),
        },
      }
    })
  }

  close(): void {
    this.db.close()
  }
}

/** Open the SQLite recorder, or fall back to discarding events if the path is unusable */
export function openMetrics(dbPath: string): MetricsRecorder {
  try {
    return new SqliteMetrics(dbPath)
  } catch (err: unknown) {
    log.warn({ path: dbPath, error: err instanceof Error ? err.message : String(err) }, 'metrics disabled')
    return new NullMetrics()
  }
}

function nearestRank(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0
  const rank = Math.max(1, Math.ceil(p * sorted.length))
  return sorted[rank - 1] ?? 0
}
