// src/mcp/tools.ts
import { z } from 'zod'
import { FilterInputSchema } from '../core/filters.js'

export const SearchNaturalInput = z.object({
  query: z.string().min(1).describe(
    'Plain-language description of the repositories wanted. ' +
    'Misspellings are fine. Examples: "good first issue python", "javascript web 500+ stars".',
  ),
  page: z.number().int().min(1).optional().describe('1-based result page (default 1).'),
})

export const SearchStatsInput = z.object({
  sinceHours: z.number().positive().optional().describe('Hours to look back (default 24).'),
})

export const tools = [
  {
    name: 'search_repositories',
    description:
      'Search GitHub repositories with explicit filters. ' +
      'Returns { filters, query, results: { totalCount, items }, elapsed_ms } where each item has ' +
      'fullName, stars, url, description and topics. Forks and archived repositories are excluded unless requested. ' +
      'Invalid filters are reported with the offending field name.',
    inputSchema: FilterInputSchema,
  },
  {
    name: 'search_natural_language',
    description:
      'Search GitHub repositories from a plain-language description. ' +
      'The description is turned into filters by a language model; if that fails, default filters are used. ' +
      'The resolved filters are echoed back in the "filters" field.',
    inputSchema: SearchNaturalInput,
  },
  {
    name: 'compile_query',
    description:
      'Validate filters and return the GitHub search query they compile to, without searching.',
    inputSchema: FilterInputSchema,
  },
  {
    name: 'search_stats',
    description: 'Request counts, error counts and P50/P95/P99 latencies per search mode.',
    inputSchema: SearchStatsInput,
  },
] as const
