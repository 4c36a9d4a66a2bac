import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { zodToJsonSchema } from 'zod-to-json-schema'
import {
  handleCompileQuery,
  handleSearchNatural,
  handleSearchRepositories,
  handleSearchStats,
} from '../../src/mcp/handlers.js'
import { tools } from '../../src/mcp/tools.js'
import { RepoSearchService } from '../../src/core/engine.js'
import { FilterResolver } from '../../src/core/resolver.js'
import { SqliteMetrics } from '../../src/core/metrics.js'
import type { SearchExecutor } from '../../src/providers/base.js'

describe('MCP handlers', () => {
  let dir: string
  let metrics: SqliteMetrics
  let executor: SearchExecutor & { execute: ReturnType<typeof vi.fn> }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'repoquery-mcp-test-'))
    metrics = new SqliteMetrics(join(dir, 'metrics.db'))
    executor = {
      name: 'github',
      execute: vi.fn().mockResolvedValue({ totalCount: 5, items: [] }),
      validate: vi.fn().mockResolvedValue(true),
    }
  })

  afterEach(() => {
    metrics.close()
    rmSync(dir, { recursive: true })
  })

  it('compile_query returns filters and query', () => {
    const out = JSON.parse(handleCompileQuery({ topics: ['web'], license: 'mit' })) as Record<string, unknown>
    expect(out['query']).toBe('topic:web license:mit fork:false archived:false')
    expect(out['filters']).toMatchObject({ topics: ['web'], license: 'mit', limit: 10 })
  })

  it('compile_query accepts missing arguments', () => {
    const out = JSON.parse(handleCompileQuery(undefined)) as Record<string, unknown>
    expect(out['query']).toBe('fork:false archived:false')
  })

  it('search_repositories reports the offending field', async () => {
    const service = new RepoSearchService(executor, undefined, metrics)
    await expect(handleSearchRepositories({ limit: 500 }, service)).rejects.toThrow(/^limit: /)
  })

  it('search_repositories returns the search response', async () => {
    const service = new RepoSearchService(executor, undefined, metrics)
    const out = JSON.parse(await handleSearchRepositories({ language: 'go' }, service)) as {
      query: string
      results: { totalCount: number }
    }
    expect(out.query).toBe('language:go fork:false archived:false')
    expect(out.results.totalCount).toBe(5)
  })

  it('search_natural_language forwards query and page', async () => {
    const resolver = new FilterResolver({ name: 'fake', complete: vi.fn().mockResolvedValue('{"language": "ruby"}') })
    const service = new RepoSearchService(executor, resolver, metrics)

    await handleSearchNatural({ query: 'ruby gems', page: 4 }, service)

    expect(executor.execute).toHaveBeenCalledWith(
      expect.objectContaining({ query: 'language:ruby fork:false archived:false', page: 4 }),
    )
  })

  it('search_stats reads the metrics database', async () => {
    await metrics.record({ mode: 'natural', query: 'language:go fork:false archived:false', elapsedMs: 40, pageCount: 2, totalCount: 2 })
    const out = JSON.parse(await handleSearchStats({}, join(dir, 'metrics.db'))) as unknown[]
    expect(out).toEqual([
      { mode: 'natural', searches: 1, failed: 0, empty: 0, fallbacks: 0, latencyMs: { p50: 40, p95: 40, p99: 40 } },
    ])
  })

  it('every tool exposes an object schema', () => {
    for (const tool of tools) {
      expect(zodToJsonSchema(tool.inputSchema)).toMatchObject({ type: 'object' })
    }
  })
})
