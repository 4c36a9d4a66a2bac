// src/core/types.ts

export const SORT_FIELDS = ['stars', 'forks', 'help-wanted-issues', 'updated'] as const
export const SORT_ORDERS = ['asc', 'desc'] as const

export type SortField = (typeof SORT_FIELDS)[number]
export type SortOrder = (typeof SORT_ORDERS)[number]
export type SearchMode = 'natural' | 'structured'

export interface StarsRange {
  readonly min?: number
  readonly max?: number
}

export interface FilterModel {
  readonly language?: string
  readonly topics: readonly string[]
  readonly stars?: StarsRange
  readonly license?: string
  readonly goodFirstIssue: boolean
  readonly helpWanted: boolean
  readonly updatedAfter?: string   // YYYY-MM-DD
  readonly createdAfter?: string   // YYYY-MM-DD
  readonly includeForks: boolean
  readonly includeArchived: boolean
  readonly sort: SortField
  readonly order: SortOrder
  readonly limit: number           // per_page, 1..100
  readonly page: number            // 1-based
}

export interface RepositorySummary {
  readonly fullName: string        // "owner/repo"
  readonly stars: number
  readonly url: string
  readonly description: string | null
  readonly topics: readonly string[]
}

/** One page as reported by the search provider */
export interface ProviderPage {
  readonly totalCount: number
  readonly items: readonly RepositorySummary[]
}

export interface SearchResultEnvelope extends ProviderPage {
  readonly filters: FilterModel
}

export interface SearchResponse {
  filters: FilterModel
  query: string
  results: SearchResultEnvelope
  elapsed_ms: number
}
