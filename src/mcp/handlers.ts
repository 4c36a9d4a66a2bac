// src/mcp/handlers.ts
import type { z } from 'zod'
import { loadConfig } from '../core/config.js'
import { buildService } from '../core/engine-factory.js'
import { SqliteMetrics } from '../core/metrics.js'
import { compileQuery } from '../core/compiler.js'
import { parseFilters } from '../core/filters.js'
import type { RepoSearchService } from '../core/engine.js'
import type { SearchNaturalInput, SearchStatsInput } from './tools.js'

// Lazy singleton -- one service per MCP server process
let _service: RepoSearchService | undefined
function getService(): RepoSearchService {
  if (!_service) _service = buildService()
  return _service
}

/** Filters are validated by the service so errors name the offending field */
export async function handleSearchRepositories(
  args: unknown,
  service: RepoSearchService = getService(),
): Promise<string> {
  const response = await service.searchStructured(args ?? {})
  return JSON.stringify(response, null, 2)
}

export async function handleSearchNatural(
  input: z.infer<typeof SearchNaturalInput>,
  service: RepoSearchService = getService(),
): Promise<string> {
  const response = await service.searchNatural(input.query, input.page ?? 1)
  return JSON.stringify(response, null, 2)
}

export function handleCompileQuery(args: unknown): string {
  const filters = parseFilters(args ?? {})
  return JSON.stringify({ filters, query: compileQuery(filters) }, null, 2)
}

export async function handleSearchStats(
  input: z.infer<typeof SearchStatsInput>,
  metricsPath: string = loadConfig().metricsPath,
): Promise<string> {
  const metrics = new SqliteMetrics(metricsPath)
  try {
    const stats = await metrics.stats((input.sinceHours ?? 24) * 3600)
    return JSON.stringify(stats, null, 2)
  } finally {
    metrics.close()
  }
}
