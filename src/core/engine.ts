// src/core/engine.ts
import type { SearchExecutor } from '../providers/base.js'
import type { FilterResolver } from './resolver.js'
import type { MetricsRecorder, SearchEvent } from './metrics.js'
import type { FilterModel, SearchMode, SearchResponse } from './types.js'
import { compileQuery } from './compiler.js'
import { assembleEnvelope } from './envelope.js'
import { ConfigError } from './errors.js'
import { parseFilters, withPage } from './filters.js'
import { createLogger } from './logger.js'

const log = createLogger({ name: 'engine' })

export interface CompiledFilters {
  filters: FilterModel
  query: string
}

export class RepoSearchService {
  constructor(
    private readonly executor: SearchExecutor,
    private readonly resolver: FilterResolver | undefined,
    private readonly metrics: MetricsRecorder,
  ) {}

  /** Validate and compile without contacting the provider */
  compile(raw: unknown): CompiledFilters {
    const filters = parseFilters(raw)
    return { filters, query: compileQuery(filters) }
  }

  async searchStructured(raw: unknown): Promise<SearchResponse> {
    return this.run('structured', parseFilters(raw))
  }

  async searchNatural(text: string, page = 1): Promise<SearchResponse> {
    if (!this.resolver) {
      throw new ConfigError('GOOGLE_API_KEY is required for natural-language search')
    }
    // reject a bad page before paying for an interpreter call
    parseFilters({ page })
    const { filters, fallback } = await this.resolver.resolveWithOutcome(text)
    return this.run('natural', withPage(filters, page), fallback)
  }

  private async run(mode: SearchMode, filters: FilterModel, fallback = false): Promise<SearchResponse> {
    const query = compileQuery(filters)
    const t0 = Date.now()
    log.info({ mode, query, page: filters.page, limit: filters.limit }, 'search request')

    try {
      const page = await this.executor.execute({
        query,
        sort: filters.sort,
        order: filters.order,
        limit: filters.limit,
        page: filters.page,
      })
      const elapsed_ms = Date.now() - t0
      log.info(
        { provider: this.executor.name, total: page.totalCount, count: page.items.length, elapsed_ms },
        'provider response',
      )
      await this.record({
        mode,
        query,
        elapsedMs: elapsed_ms,
        pageCount: page.items.length,
        totalCount: page.totalCount,
        fallback,
      })
      return { filters, query, results: assembleEnvelope(filters, page), elapsed_ms }
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err)
      log.warn({ provider: this.executor.name, query, error: message }, 'provider error')
      await this.record({ mode, query, elapsedMs: Date.now() - t0, fallback, error: message })
      throw err
    }
  }

  private async record(e: SearchEvent): Promise<void> {
    await this.metrics.record(e).catch((err: unknown) => {
      log.warn({ error: String(err) }, 'metrics write failed')
    })
  }
}
